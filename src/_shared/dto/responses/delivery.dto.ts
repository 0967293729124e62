import {
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { AdcpResponseDto } from './adcp-response.dto';

export class DeliveryTotalsDto {
  @IsNumber()
  @Min(0)
  impressions!: number;

  @IsNumber()
  @Min(0)
  spend!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  clicks?: number;
}

export class MediaBuyDeliveryDto {
  @IsString()
  @IsNotEmpty()
  media_buy_id!: string;

  @IsOptional()
  @IsString()
  status?: string;

  @ValidateNested()
  @Type(() => DeliveryTotalsDto)
  totals!: DeliveryTotalsDto;
}

export class ReportingPeriodDto {
  @IsString()
  start!: string;

  @IsString()
  end!: string;
}

/**
 * get_media_buy_delivery
 */
export class GetMediaBuyDeliveryResponseDto extends AdcpResponseDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => ReportingPeriodDto)
  reporting_period?: ReportingPeriodDto;

  @IsOptional()
  @IsString()
  currency?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MediaBuyDeliveryDto)
  media_buy_deliveries!: MediaBuyDeliveryDto[];
}
