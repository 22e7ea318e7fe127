import { Global, Module } from '@nestjs/common';

import { applicationSecretProvider } from './application-secret.provider';
import { FieldCipherService } from './field-cipher.service';
import { KeyDeriver } from './key-deriver';

@Global()
@Module({
  providers: [applicationSecretProvider, KeyDeriver, FieldCipherService],
  exports: [FieldCipherService],
})
export class CryptoModule {}
