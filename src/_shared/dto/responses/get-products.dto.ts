import {
  IsArray,
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { AdcpResponseDto } from './adcp-response.dto';
import { FormatIdDto } from './format.dto';

export class ProductDto {
  @IsString()
  @IsNotEmpty()
  product_id!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  description!: string;

  @IsOptional()
  @IsString()
  delivery_type?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FormatIdDto)
  format_ids?: FormatIdDto[];

  @IsOptional()
  @IsBoolean()
  is_custom?: boolean;
}

/**
 * get_products
 */
export class GetProductsResponseDto extends AdcpResponseDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ProductDto)
  products!: ProductDto[];
}
