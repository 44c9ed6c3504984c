import { IsIn, IsOptional } from 'class-validator';
import {
  RELOAD_SOURCES,
  type ReloadSource,
} from '../../config-store/types/config.types';

export class ReloadQueryDto {
  /** Omitted means both sources */
  @IsOptional()
  @IsIn(RELOAD_SOURCES)
  declare source?: ReloadSource;
}
