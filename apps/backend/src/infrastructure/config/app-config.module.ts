import { Module, Global } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './env.validation';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      // Coerced values (PORT, REDIS_PORT, ...) replace the raw strings.
      validate: (config: Record<string, unknown>) => validateEnv(config),
    }),
  ],
  exports: [ConfigModule],
})
export class AppConfigModule {}
