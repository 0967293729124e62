import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { AdcpResponseDto } from './adcp-response.dto';

export const ASSET_ITEM_TYPES = ['individual', 'repeatable_group'] as const;
export type AssetItemType = (typeof ASSET_ITEM_TYPES)[number];

/**
 * Format reference, namespaced by the agent that defines it
 */
export class FormatIdDto {
  @IsString()
  @IsNotEmpty()
  agent_url!: string;

  @IsString()
  @IsNotEmpty()
  id!: string;
}

/**
 * Asset slot of a creative format: a single asset, or a repeatable group
 * of assets (carousel cards, ...)
 */
export class FormatAssetDto {
  @IsOptional()
  @IsIn(ASSET_ITEM_TYPES)
  item_type?: AssetItemType;

  @IsOptional()
  @IsString()
  asset_id?: string;

  @IsOptional()
  @IsString()
  asset_type?: string;

  @IsOptional()
  @IsString()
  asset_group_id?: string;

  @IsOptional()
  @IsBoolean()
  required?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  min_count?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  max_count?: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FormatAssetDto)
  assets?: FormatAssetDto[];
}

export class FormatDto {
  @ValidateNested()
  @Type(() => FormatIdDto)
  format_id!: FormatIdDto;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  type?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FormatAssetDto)
  assets?: FormatAssetDto[];
}

/**
 * list_creative_formats
 */
export class ListCreativeFormatsResponseDto extends AdcpResponseDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FormatDto)
  formats!: FormatDto[];
}
