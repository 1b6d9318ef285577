/**
 * Issue the bearer token the oracle service sends with its fulfillments.
 *
 * Usage:
 * npm run token:coordinator -- [validForDays]
 * npm run token:coordinator -- 30
 */

import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '../src/config/config.service';

const config = new ConfigService();
const validForDays = Number(process.argv[2] || '365');

if (!Number.isInteger(validForDays) || validForDays <= 0) {
  console.error(`validForDays must be a positive integer, got "${process.argv[2]}"`);
  process.exit(1);
}

const jwtService = new JwtService({
  secret: config.coordinatorJwtSecret,
  signOptions: { algorithm: 'HS256', expiresIn: validForDays * 24 * 60 * 60 },
});

const token = jwtService.sign({ sub: config.vrfCoordinator.toLowerCase() });

console.log(`Coordinator: ${config.vrfCoordinator}`);
console.log(`Valid for:   ${validForDays} day(s)`);
console.log(token);
