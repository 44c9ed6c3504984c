import { Module } from '@nestjs/common';
import { ConfigStoreService } from './config-store.service';
import { LocalConfigSource, RemoteConfigSource } from './sources/config-sources';
import { FileConfigSource } from './sources/file-config.source';
import { HttpRemoteConfigClient } from './sources/http-remote-config.client';

@Module({
  providers: [
    { provide: LocalConfigSource, useClass: FileConfigSource },
    { provide: RemoteConfigSource, useClass: HttpRemoteConfigClient },
    ConfigStoreService,
  ],
  exports: [ConfigStoreService],
})
export class ConfigStoreModule {}
