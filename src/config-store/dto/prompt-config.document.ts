/**
 * Shapes of the prompt configuration and index schema documents,
 * validated with class-validator before a snapshot is built.
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { INTENT_ACTIONS, type IntentAction } from '../types/config.types';

export class IntentDocument {
  @IsOptional()
  @IsString()
  declare description?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  declare keywords?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  declare patterns?: string[];

  @IsIn(INTENT_ACTIONS)
  declare action: IntentAction;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  declare template?: string;
}

export class PromptConfigDocument {
  @IsObject()
  declare intents: Record<string, unknown>;

  @IsOptional()
  @IsString()
  declare default_intent?: string;

  @IsOptional()
  @IsObject()
  declare core_prompts?: Record<string, unknown>;

  @IsObject()
  declare query_templates: Record<string, unknown>;

  @IsOptional()
  @IsObject()
  declare response_templates?: Record<string, unknown>;
}

export class IndexDocument {
  @IsString()
  @IsNotEmpty()
  declare name: string;

  @IsOptional()
  @IsString()
  declare description?: string;

  @IsArray()
  @IsString({ each: true })
  declare fields: string[];
}

export class IndexSchemaDocument {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => IndexDocument)
  declare indexes: IndexDocument[];
}
