/**
 * Admin Controller
 * Runs on the admin port, separate from the chat gateway, and carries
 * no authentication.
 */

import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  Query,
  ValidationPipe,
} from '@nestjs/common';
import { ConfigStoreService } from '../config-store/config-store.service';
import type { ReloadReport } from '../config-store/types/config.types';
import { VectorStore } from '../providers/vector-store/vector-store';
import { ReloadQueryDto } from './dto/reload-query.dto';

interface HealthResponse {
  status: 'ok' | 'degraded';
  configVersion: number;
  configLoadedAt: string;
  promptSource: string;
  vectorStore: { kind: string; healthy: boolean };
}

@Controller('api')
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    private readonly configStore: ConfigStoreService,
    private readonly vectorStore: VectorStore,
  ) {}

  /**
   * GET /api/reload-prompts?source=local|remote|both
   *
   * Response (400 when any source failed):
   * {
   *   "success": true,
   *   "message": "Reload complete",
   *   "details": ["Local reloaded", "Remote unchanged"],
   *   "sources": { "local": { "status": "reloaded" }, ... },
   *   "version": 3
   * }
   */
  @Get('reload-prompts')
  async reloadPrompts(
    @Query(ValidationPipe) query: ReloadQueryDto,
  ): Promise<ReloadReport> {
    const source = query.source ?? 'both';
    this.logger.log(`Reload requested: source=${source}`);

    const report = await this.configStore.reload(source);

    if (!report.success) {
      this.logger.warn(`Reload finished with errors: ${report.details.join('; ')}`);
      throw new BadRequestException(report);
    }
    return report;
  }

  @Get('health')
  async health(): Promise<HealthResponse> {
    const snapshot = this.configStore.current();
    const healthy = await this.vectorStore.healthCheck();

    return {
      status: healthy ? 'ok' : 'degraded',
      configVersion: snapshot.version,
      configLoadedAt: snapshot.loadedAt.toISOString(),
      promptSource: snapshot.promptSource,
      vectorStore: { kind: this.vectorStore.kind, healthy },
    };
  }
}
