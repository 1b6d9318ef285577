import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '../../config/config.service';
import { CoordinatorJwtStrategy } from './coordinator-jwt.strategy';

describe('CoordinatorJwtStrategy', () => {
  const originalEnv = process.env;
  let strategy: CoordinatorJwtStrategy;

  beforeEach(() => {
    process.env = {
      ...originalEnv,
      VRF_COORDINATOR: '0x00000000000000000000000000000000000000C0',
      COORDINATOR_JWT_SECRET: 'test-secret',
    };
    strategy = new CoordinatorJwtStrategy(new ConfigService());
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('accepts the configured coordinator regardless of case', () => {
    expect(strategy.validate({ sub: '0x00000000000000000000000000000000000000c0' })).toEqual({
      coordinator: '0x00000000000000000000000000000000000000c0',
    });
  });

  it('rejects any other subject', () => {
    expect(() => strategy.validate({ sub: '0x00000000000000000000000000000000000000c1' })).toThrow(
      UnauthorizedException,
    );
  });

  it('rejects a token without subject', () => {
    expect(() => strategy.validate({})).toThrow(UnauthorizedException);
  });
});
