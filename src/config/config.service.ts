import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';
import { RaffleConfig } from '../raffle/domain/raffle.entity';

dotenv.config();

export type CoordinatorMode = 'local' | 'http';

const DEFAULT_ENTRANCE_FEE = '10000000000000000'; // 0.01 ETH in wei
const DEFAULT_COORDINATOR = '0x5c210ef41cd1a72de73bf76ec39637bb0d3d7bee';
const DEFAULT_KEY_HASH =
  '0x787d74caea10b2b357790d5b5247c2f63d1d91572a9846f780606e4d953677ae';

function readUnsignedBigInt(name: string, fallback: string): bigint {
  const raw = process.env[name] || fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be an unsigned integer, got "${raw}"`);
  }
  return BigInt(raw);
}

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

@Injectable()
export class ConfigService {
  get mongoUri(): string {
    return process.env.MONGODB_URI || 'mongodb://localhost:27017/raffle';
  }

  get redisUrl(): string | undefined {
    return process.env.REDIS_URL;
  }

  get port(): number {
    return parseInt(process.env.PORT || '3001', 10);
  }

  get nodeEnv(): string {
    return process.env.NODE_ENV || 'development';
  }

  /**
   * Construction parameters of the raffle. Only read when no raffle is
   * stored yet; afterwards the stored values win.
   */
  get raffle(): RaffleConfig {
    return {
      entranceFee: readUnsignedBigInt('RAFFLE_ENTRANCE_FEE', DEFAULT_ENTRANCE_FEE),
      interval: readPositiveInt('RAFFLE_INTERVAL', 30),
      vrfCoordinator: this.vrfCoordinator,
      keyHash: process.env.VRF_KEY_HASH || DEFAULT_KEY_HASH,
      subscriptionId: readUnsignedBigInt('VRF_SUBSCRIPTION_ID', '0'),
      callbackGasLimit: readPositiveInt('VRF_CALLBACK_GAS_LIMIT', 500000),
    };
  }

  get vrfCoordinator(): string {
    return process.env.VRF_COORDINATOR || DEFAULT_COORDINATOR;
  }

  /**
   * Base URL of the remote oracle service. Only needed in http mode; the
   * oracle's address in VRF_COORDINATOR is what it signs its callbacks as.
   */
  get vrfCoordinatorUrl(): string {
    const url = process.env.VRF_COORDINATOR_URL;
    if (!url) {
      throw new Error('VRF_COORDINATOR_URL is required when VRF_COORDINATOR_MODE=http');
    }
    if (!/^https?:\/\//.test(url)) {
      throw new Error(`VRF_COORDINATOR_URL must be an http(s) URL, got "${url}"`);
    }
    return url;
  }

  get vrfCoordinatorTimeoutMs(): number {
    return readPositiveInt('VRF_COORDINATOR_TIMEOUT_MS', 10000);
  }

  get coordinatorMode(): CoordinatorMode {
    const mode = process.env.VRF_COORDINATOR_MODE || 'local';
    if (mode !== 'local' && mode !== 'http') {
      throw new Error(`VRF_COORDINATOR_MODE must be "local" or "http", got "${mode}"`);
    }
    return mode;
  }

  get coordinatorJwtSecret(): string {
    return process.env.COORDINATOR_JWT_SECRET || 'change-me';
  }

  get raffleEventsChannel(): string {
    return process.env.RAFFLE_EVENTS_CHANNEL || 'raffle:events';
  }

  // Must outlast a coordinator request, or a second draw can start under it.
  get raffleLockTtlMs(): number {
    return readPositiveInt('RAFFLE_LOCK_TTL_MS', 30000);
  }

  get raffleLockWaitMs(): number {
    return readPositiveInt('RAFFLE_LOCK_WAIT_MS', 5000);
  }

  get automationEnabled(): boolean {
    return process.env.RAFFLE_AUTOMATION_ENABLED === 'true';
  }
}
