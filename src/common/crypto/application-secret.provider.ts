import { Logger, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { ApplicationSecretSource } from './crypto.types';

export const APPLICATION_SECRET_SOURCE = 'APPLICATION_SECRET_SOURCE';

/** Reads APP_SECRET once; later config changes do not affect the key. */
export function createApplicationSecretSource(
  configService: ConfigService,
): ApplicationSecretSource {
  const secret = configService.get<string>('APP_SECRET', '');

  if (!secret) {
    new Logger('ApplicationSecret').warn(
      'APP_SECRET is not set; field encryption key is derived from an empty secret',
    );
  }

  return {
    getApplicationSecret: () => secret,
  };
}

export const applicationSecretProvider: Provider = {
  provide: APPLICATION_SECRET_SOURCE,
  useFactory: createApplicationSecretSource,
  inject: [ConfigService],
};
