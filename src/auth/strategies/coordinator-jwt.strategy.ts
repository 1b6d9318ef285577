import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '../../config/config.service';

export const COORDINATOR_JWT_STRATEGY = 'coordinator-jwt';

export interface CoordinatorTokenPayload {
  sub?: string;
}

export interface AuthenticatedCoordinator {
  coordinator: string;
}

/**
 * Accepts bearer tokens signed with COORDINATOR_JWT_SECRET whose subject is
 * the configured coordinator address.
 */
@Injectable()
export class CoordinatorJwtStrategy extends PassportStrategy(Strategy, COORDINATOR_JWT_STRATEGY) {
  constructor(private readonly configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.coordinatorJwtSecret,
      algorithms: ['HS256'],
    });
  }

  validate(payload: CoordinatorTokenPayload): AuthenticatedCoordinator {
    const coordinator = this.configService.vrfCoordinator.toLowerCase();
    if (typeof payload.sub !== 'string' || payload.sub.toLowerCase() !== coordinator) {
      throw new UnauthorizedException('Only the coordinator can fulfill draws');
    }
    return { coordinator };
  }
}
