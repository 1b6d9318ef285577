import { Logger, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ScheduleModule } from '@nestjs/schedule';
import axios from 'axios';
import { ConfigService } from '../config/config.service';
import { AuthModule } from '../auth/auth.module';
import { RaffleService } from './application/raffle.service';
import { RaffleLockService } from './application/raffle-lock.service';
import { RaffleEventsService } from './application/raffle-events.service';
import { RaffleAutomationService } from './application/raffle-automation.service';
import { RaffleController } from './presentation/raffle.controller';
import { LocalCoordinatorController } from './presentation/local-coordinator.controller';
import { RaffleDocument, RaffleSchema } from './infrastructure/schemas/raffle.schema';
import { WalletDocument, WalletSchema } from './infrastructure/schemas/wallet.schema';
import { MongoRaffleRepository } from './infrastructure/repositories/mongo-raffle.repository';
import { MongoWalletPayoutGateway } from './infrastructure/payouts/mongo-wallet-payout.gateway';
import { LocalVrfCoordinator } from './infrastructure/coordinators/local-vrf-coordinator';
import { HttpVrfCoordinator } from './infrastructure/coordinators/http-vrf-coordinator';
import { RAFFLE_REPOSITORY } from './domain/raffle.repository';
import { RANDOMNESS_COORDINATOR, RandomnessCoordinator } from './domain/randomness-coordinator';
import { PAYOUT_GATEWAY } from './domain/payout-gateway';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: RaffleDocument.name, schema: RaffleSchema },
      { name: WalletDocument.name, schema: WalletSchema },
    ]),
    ScheduleModule.forRoot(),
    AuthModule,
  ],
  controllers: [RaffleController, LocalCoordinatorController],
  providers: [
    RaffleService,
    RaffleLockService,
    RaffleEventsService,
    RaffleAutomationService,
    LocalVrfCoordinator,
    {
      provide: RAFFLE_REPOSITORY,
      useClass: MongoRaffleRepository,
    },
    {
      provide: PAYOUT_GATEWAY,
      useClass: MongoWalletPayoutGateway,
    },
    {
      provide: RANDOMNESS_COORDINATOR,
      useFactory: (configService: ConfigService, local: LocalVrfCoordinator): RandomnessCoordinator => {
        if (configService.coordinatorMode !== 'http') {
          return local;
        }
        const timeout = configService.vrfCoordinatorTimeoutMs;
        if (timeout >= configService.raffleLockTtlMs) {
          new Logger(RaffleModule.name).warn(
            `VRF_COORDINATOR_TIMEOUT_MS (${timeout}) should stay below RAFFLE_LOCK_TTL_MS (${configService.raffleLockTtlMs})`,
          );
        }
        return new HttpVrfCoordinator(
          axios.create({ baseURL: configService.vrfCoordinatorUrl, timeout }),
        );
      },
      inject: [ConfigService, LocalVrfCoordinator],
    },
  ],
  exports: [RaffleService],
})
export class RaffleModule {}
