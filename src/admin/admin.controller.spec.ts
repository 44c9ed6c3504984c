import { beforeEach, describe, expect, it } from '@jest/globals';
import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { Test, type TestingModule } from '@nestjs/testing';
import { AdminController } from './admin.controller';
import { ReloadQueryDto } from './dto/reload-query.dto';
import { ConfigStoreService } from '../config-store/config-store.service';
import { VectorStore } from '../providers/vector-store/vector-store';
import { InMemoryVectorStore } from '../providers/vector-store/in-memory-vector-store';
import {
  StubLocalSource,
  StubRemoteSource,
  promptsWithGreeting,
} from '../testing/stub-config-sources';

describe('AdminController', () => {
  let controller: AdminController;
  let local: StubLocalSource;

  beforeEach(async () => {
    local = new StubLocalSource();
    const configStore = new ConfigStoreService(
      local,
      new StubRemoteSource(),
      new ConfigService({}),
      new SchedulerRegistry(),
    );
    await configStore.initialize();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AdminController],
      providers: [
        { provide: ConfigStoreService, useValue: configStore },
        { provide: VectorStore, useValue: new InMemoryVectorStore() },
      ],
    }).compile();

    controller = module.get<AdminController>(AdminController);
  });

  describe('reloadPrompts', () => {
    it('reloads both sources when none is named', async () => {
      local.promptsText = promptsWithGreeting('Updated hello');

      const report = await controller.reloadPrompts({});

      expect(report).toMatchObject({
        success: true,
        message: 'Reload complete',
        details: ['Local reloaded', 'Remote disabled'],
        version: 2,
      });
    });

    it('answers 400 with the report when a source failed', async () => {
      local.promptsText = '{"intents": ';

      const failure = await controller.reloadPrompts({ source: 'local' }).then(
        () => null,
        (error: unknown) => error,
      );

      expect(failure).toBeInstanceOf(BadRequestException);
      if (failure instanceof BadRequestException) {
        expect(failure.getStatus()).toBe(400);
        expect(failure.getResponse()).toMatchObject({
          success: false,
          message: 'Reload errors',
          version: 1,
        });
      }
    });

    it('rejects an unknown source', async () => {
      const pipe = new ValidationPipe();

      await expect(
        pipe.transform({ source: 'everything' }, { type: 'query', metatype: ReloadQueryDto }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  it('reports health', async () => {
    const health = await controller.health();

    expect(health).toEqual({
      status: 'ok',
      configVersion: 1,
      configLoadedAt: expect.any(String),
      promptSource: 'local',
      vectorStore: { kind: 'memory', healthy: true },
    });
    expect(Number.isNaN(Date.parse(health.configLoadedAt))).toBe(false);
  });
});
