import {
  IsArray,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { JsonObject } from '../../../core/interfaces/common.types';

/**
 * Entry of the `errors` array every AdCP response may carry
 */
export class AdcpErrorDto {
  @IsOptional()
  @IsString()
  code?: string;

  @IsString()
  @IsNotEmpty()
  message!: string;

  @IsOptional()
  @IsString()
  field?: string;

  @IsOptional()
  @IsString()
  suggestion?: string;

  @IsOptional()
  @IsObject()
  details?: JsonObject;
}

/**
 * Fields shared by all task responses
 */
export abstract class AdcpResponseDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AdcpErrorDto)
  errors?: AdcpErrorDto[];

  /**
   * Opaque value echoed back from the request
   */
  @IsOptional()
  @IsObject()
  context?: JsonObject;
}

/**
 * Whether the response reports errors instead of a result.
 * Responses with errors may omit their required identifiers.
 */
export function hasErrors(response: AdcpResponseDto): boolean {
  return response.errors !== undefined && response.errors.length > 0;
}
