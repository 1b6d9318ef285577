import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { CoordinatorJwtStrategy } from './strategies/coordinator-jwt.strategy';

@Module({
  imports: [PassportModule],
  providers: [CoordinatorJwtStrategy],
  exports: [PassportModule],
})
export class AuthModule {}
