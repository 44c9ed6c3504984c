import { Module } from '@nestjs/common';
import { ConfigStoreModule } from '../config-store/config-store.module';
import { OrchestratorModule } from '../orchestrator/orchestrator.module';
import { HistoryModule } from '../history/history.module';
import { ChatGatewayService } from './chat-gateway.service';

@Module({
  imports: [ConfigStoreModule, OrchestratorModule, HistoryModule],
  providers: [ChatGatewayService],
})
export class GatewayModule {}
