import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { VECTOR_STORE_TYPES } from '../types';
import { VectorStore } from './vector-store';
import { QdrantVectorStore } from './qdrant-vector-store';
import { InMemoryVectorStore } from './in-memory-vector-store';
import { readChoice } from '../../shared/utils/config-readers';

/**
 * Selects the vector store implementation once, from VECTOR_STORE_TYPE.
 */
export class VectorStoreFactory {
  private static readonly logger = new Logger(VectorStoreFactory.name);

  static create(configService: ConfigService): VectorStore {
    const type = readChoice(
      configService,
      'VECTOR_STORE_TYPE',
      VECTOR_STORE_TYPES,
      'qdrant',
    );

    VectorStoreFactory.logger.log(`Creating vector store: ${type}`);

    switch (type) {
      case 'qdrant':
        return new QdrantVectorStore({
          url: configService.get<string>('QDRANT_URL', 'http://localhost:6333'),
          apiKey: configService.get<string>('QDRANT_API_KEY') || undefined,
          vectorName: configService.get<string>('QDRANT_VECTOR_NAME') || undefined,
        });

      case 'memory':
        return new InMemoryVectorStore();
    }
  }
}
