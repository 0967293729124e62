import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AdcpModule } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    AdcpModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        webhooks: {
          secret: config.get<string>('ADCP_WEBHOOK_SECRET'),
          requireSignature: config.get<string>('ADCP_REQUIRE_SIGNATURE') === 'true',
        },
        api: {
          globalPrefix: config.get<string>('API_PREFIX'),
        },
        debug: config.get<string>('ADCP_DEBUG') === 'true',
      }),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
