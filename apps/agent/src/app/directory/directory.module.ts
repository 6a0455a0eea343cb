import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { DirectoryClientService } from './directory-client.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [DirectoryClientService],
  exports: [DirectoryClientService]
})
export class DirectoryModule {}
