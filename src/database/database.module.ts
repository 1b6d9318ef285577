import { Global, Logger, Module } from '@nestjs/common';
import { MongooseModule, MongooseModuleFactoryOptions } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { ConfigService } from '../config/config.service';

const logger = new Logger('Database');

@Global()
@Module({
  imports: [
    MongooseModule.forRootAsync({
      useFactory: (configService: ConfigService): MongooseModuleFactoryOptions => ({
        uri: configService.mongoUri,
        serverSelectionTimeoutMS: 5000,
        connectionFactory: (connection: Connection) => {
          logger.log(`Connected to ${connection.name}`);
          connection.on('disconnected', () => logger.warn('MongoDB disconnected'));
          connection.on('reconnected', () => logger.log('MongoDB reconnected'));
          return connection;
        },
      }),
      inject: [ConfigService],
    }),
  ],
  exports: [MongooseModule],
})
export class DatabaseModule {}
