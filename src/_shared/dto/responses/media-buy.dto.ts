import {
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { AdcpResponseDto, hasErrors } from './adcp-response.dto';

export class PackageDto {
  @IsString()
  @IsNotEmpty()
  package_id!: string;

  @IsOptional()
  @IsString()
  buyer_ref?: string;

  @IsOptional()
  @IsString()
  status?: string;
}

/**
 * create_media_buy. A rejected buy carries `errors` and no `media_buy_id`.
 */
export class CreateMediaBuyResponseDto extends AdcpResponseDto {
  @ValidateIf((response: CreateMediaBuyResponseDto) => !hasErrors(response))
  @IsString()
  @IsNotEmpty()
  media_buy_id?: string;

  @IsOptional()
  @IsString()
  buyer_ref?: string;

  @IsOptional()
  @IsString()
  creative_deadline?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PackageDto)
  packages?: PackageDto[];
}

/**
 * update_media_buy
 */
export class UpdateMediaBuyResponseDto extends AdcpResponseDto {
  @ValidateIf((response: UpdateMediaBuyResponseDto) => !hasErrors(response))
  @IsString()
  @IsNotEmpty()
  media_buy_id?: string;

  @IsOptional()
  @IsString()
  buyer_ref?: string;

  @IsOptional()
  @IsString()
  implementation_date?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PackageDto)
  affected_packages?: PackageDto[];
}
