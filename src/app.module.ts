import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { RedisModule } from './redis/redis.module';
import { RaffleModule } from './raffle/raffle.module';

@Module({
  imports: [
    ConfigModule,
    RedisModule,
    DatabaseModule,
    RaffleModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
