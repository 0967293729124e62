import {
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { JsonObject } from '../../../core/interfaces/common.types';
import { AdcpResponseDto } from './adcp-response.dto';
import { FormatIdDto } from './format.dto';

export class CreativeDto {
  @IsString()
  @IsNotEmpty()
  creative_id!: string;

  @IsString()
  name!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => FormatIdDto)
  format_id?: FormatIdDto;

  @IsOptional()
  @IsString()
  status?: string;

  @IsOptional()
  @IsString()
  created_date?: string;
}

/**
 * list_creatives
 */
export class ListCreativesResponseDto extends AdcpResponseDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CreativeDto)
  creatives!: CreativeDto[];

  @IsOptional()
  @IsObject()
  query_summary?: JsonObject;

  @IsOptional()
  @IsObject()
  pagination?: JsonObject;
}

export const SYNC_ACTIONS = ['created', 'updated', 'unchanged', 'failed', 'deleted'] as const;
export type SyncAction = (typeof SYNC_ACTIONS)[number];

export class SyncCreativeResultDto {
  @IsString()
  @IsNotEmpty()
  creative_id!: string;

  @IsIn(SYNC_ACTIONS)
  action!: SyncAction;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  errors?: string[];
}

/**
 * sync_creatives
 */
export class SyncCreativesResponseDto extends AdcpResponseDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SyncCreativeResultDto)
  creatives?: SyncCreativeResultDto[];

  @IsOptional()
  @IsBoolean()
  dry_run?: boolean;
}
