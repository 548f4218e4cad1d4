import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const isProduction = configService.get('nodeEnv') === 'production';

        return {
          type: 'postgres',
          url: configService.getOrThrow<string>('databaseUrl'),
          autoLoadEntities: true,
          synchronize: configService.get<boolean>('db.sync') ?? false,
          logging: configService.get<boolean>('db.log') ?? false,
          // managed Postgres in production terminates TLS with its own CA
          ssl: isProduction ? { rejectUnauthorized: false } : false,
        };
      },
    }),
  ],
})
export class DatabaseModule {}
