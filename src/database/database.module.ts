import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const sslEnabled =
          config.get<boolean>('database.ssl') === true ||
          config.get<string>('nodeEnv') === 'production';

        return {
          type: 'postgres',
          url: config.getOrThrow<string>('database.url'),
          autoLoadEntities: true,
          synchronize: config.get<boolean>('database.sync') ?? false,
          logging: config.get<boolean>('database.log') ?? false,
          ssl: sslEnabled ? { rejectUnauthorized: false } : false,
        };
      },
    }),
  ],
})
export class DatabaseModule {}
