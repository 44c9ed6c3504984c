import { Module } from '@nestjs/common';
import { ConfigStoreModule } from '../config-store/config-store.module';
import { AdminController } from './admin.controller';

@Module({
  imports: [ConfigStoreModule],
  controllers: [AdminController],
})
export class AdminModule {}
