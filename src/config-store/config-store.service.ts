import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  LocalConfigSource,
  RemoteConfigSource,
} from './sources/config-sources';
import { deepFreeze } from './config-parser';
import { ConfigError, InvalidConfigError } from './errors/config-errors';
import type {
  ConfigSnapshot,
  IndexSchema,
  PromptConfig,
  PromptSource,
  ReloadReport,
  ReloadSource,
  SourceOutcome,
} from './types/config.types';
import { readNumber } from '../shared/utils/config-readers';

const RELOAD_INTERVAL_NAME = 'config-store-reload';

interface Draft {
  prompts: PromptConfig;
  schema: IndexSchema;
  promptSource: PromptSource;
  changed: boolean;
}

function describeFailure(error: unknown): SourceOutcome {
  return {
    status: 'failed',
    error: {
      code: error instanceof ConfigError ? error.code : 'CONFIG_SOURCE_UNAVAILABLE',
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

/**
 * Holds the active configuration snapshot behind a single reference.
 * Readers take `current()` once per request and keep that object; reloads
 * build a complete replacement and swap it in one assignment.
 */
@Injectable()
export class ConfigStoreService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ConfigStoreService.name);

  private snapshot: ConfigSnapshot | null = null;
  private localFingerprint: string | null = null;
  private reloadQueue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly localSource: LocalConfigSource,
    private readonly remoteSource: RemoteConfigSource,
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.initialize();

    const intervalSeconds = readNumber(
      this.configService,
      'CONFIG_RELOAD_INTERVAL_SECONDS',
      0,
    );
    if (intervalSeconds > 0) {
      const interval = setInterval(() => {
        void this.reload('both').then(
          (report) => {
            if (!report.success) {
              this.logger.warn(
                `[ConfigStore] periodic reload finished with errors: ${report.details.join('; ')}`,
              );
            }
          },
          (error: unknown) => {
            this.logger.error(
              `[ConfigStore] periodic reload failed: ${error instanceof Error ? error.message : String(error)}`,
            );
          },
        );
      }, intervalSeconds * 1000);
      this.schedulerRegistry.addInterval(RELOAD_INTERVAL_NAME, interval);
      this.logger.log(`Periodic configuration reload every ${intervalSeconds}s`);
    }
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', RELOAD_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(RELOAD_INTERVAL_NAME);
    }
  }

  /**
   * Loads the first snapshot. Local sources must succeed; remote prompts,
   * when enabled and reachable, take precedence over the local file.
   */
  async initialize(): Promise<ConfigSnapshot> {
    const local = await this.localSource.load();
    let prompts = local.prompts;
    let promptSource: PromptSource = 'local';

    if (this.remoteSource.enabled) {
      try {
        const remote = await this.remoteSource.fetch();
        if (remote.prompts !== null) {
          prompts = remote.prompts;
          promptSource = 'remote';
        }
      } catch (error) {
        this.logger.warn(
          `[ConfigStore] remote configuration unavailable at startup, using local prompts: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    if (!prompts) {
      throw new InvalidConfigError(
        'prompt configuration',
        'neither the local file nor the remote source provided one',
      );
    }

    this.localFingerprint = local.fingerprint;
    const snapshot = this.swap({
      prompts,
      schema: local.schema,
      promptSource,
      changed: true,
    });
    this.logger.log(
      `[ConfigStore] status=loaded version=${snapshot.version} prompts=${promptSource} intents=${prompts.intents.length} indexes=${local.schema.indexes.length}`,
    );
    return snapshot;
  }

  /**
   * Active snapshot. Never blocks; the returned object is immutable.
   */
  current(): ConfigSnapshot {
    if (!this.snapshot) {
      throw new Error('Configuration has not been loaded yet');
    }
    return this.snapshot;
  }

  /**
   * Re-reads the selected sources. Each source succeeds or fails on its own
   * and is reported separately; reloads run one at a time.
   */
  reload(source: ReloadSource = 'both'): Promise<ReloadReport> {
    const run = this.reloadQueue.then(() => this.performReload(source));
    this.reloadQueue = run.catch((error: unknown) => {
      this.logger.error(
        `[ConfigStore] reload aborted: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
    return run;
  }

  private async performReload(source: ReloadSource): Promise<ReloadReport> {
    const base = this.current();
    const draft: Draft = {
      prompts: base.prompts,
      schema: base.schema,
      promptSource: base.promptSource,
      changed: false,
    };
    const details: string[] = [];
    const sources: ReloadReport['sources'] = {};
    let nextFingerprint = this.localFingerprint;

    if (source === 'local' || source === 'both') {
      try {
        const local = await this.localSource.load();
        if (local.fingerprint === this.localFingerprint) {
          sources.local = { status: 'unchanged' };
          details.push('Local unchanged');
        } else {
          draft.schema = local.schema;
          if (local.prompts) {
            draft.prompts = local.prompts;
            draft.promptSource = 'local';
          }
          draft.changed = true;
          nextFingerprint = local.fingerprint;
          sources.local = { status: 'reloaded' };
          details.push('Local reloaded');
        }
      } catch (error) {
        sources.local = describeFailure(error);
        details.push(`Local error: ${sources.local.error?.message ?? ''}`);
      }
    }

    if (source === 'remote' || source === 'both') {
      if (!this.remoteSource.enabled) {
        sources.remote = { status: 'disabled' };
        details.push('Remote disabled');
      } else {
        try {
          const remote = await this.remoteSource.fetch();
          if (remote.status === 'modified') {
            draft.prompts = remote.prompts;
            draft.promptSource = 'remote';
            draft.changed = true;
            sources.remote = { status: 'reloaded' };
            details.push('Remote reloaded');
          } else {
            // The local file may have just replaced the remote prompts
            if (draft.promptSource !== 'remote' && remote.prompts !== null) {
              draft.prompts = remote.prompts;
              draft.promptSource = 'remote';
              draft.changed = true;
            }
            sources.remote = { status: 'unchanged' };
            details.push('Remote unchanged');
          }
        } catch (error) {
          sources.remote = describeFailure(error);
          details.push(`Remote error: ${sources.remote.error?.message ?? ''}`);
        }
      }
    }

    let version = base.version;
    if (draft.changed) {
      version = this.swap(draft).version;
      this.localFingerprint = nextFingerprint;
    }

    const success = !Object.values(sources).some(
      (outcome) => outcome?.status === 'failed',
    );
    const report: ReloadReport = {
      success,
      message: success ? 'Reload complete' : 'Reload errors',
      details,
      sources,
      version,
    };

    this.logger.log(
      `[ConfigStore] stage=reload source=${source} success=${success} version=${version} details="${details.join('; ')}"`,
    );
    return report;
  }

  private swap(draft: Draft): ConfigSnapshot {
    const next: ConfigSnapshot = deepFreeze({
      version: (this.snapshot?.version ?? 0) + 1,
      prompts: draft.prompts,
      schema: draft.schema,
      promptSource: draft.promptSource,
      loadedAt: new Date(),
    });
    this.snapshot = next;
    return next;
  }
}
