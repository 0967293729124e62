import {
  IsISO8601,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { JsonObject } from '../../../core/interfaces/common.types';

/**
 * MCP webhook body
 */
export class McpWebhookPayloadDto {
  @ApiProperty({ description: 'Agent task identifier', example: 'task_123' })
  @IsString()
  @IsNotEmpty()
  task_id!: string;

  @ApiProperty({
    description: 'Task status in MCP vocabulary',
    example: 'completed',
  })
  @IsString()
  status!: string;

  @ApiProperty({
    description: 'When the agent produced this update (ISO-8601)',
    example: '2025-01-15T10:00:00Z',
  })
  @IsISO8601()
  timestamp!: string;

  @ApiPropertyOptional({ example: 'get_products' })
  @IsOptional()
  @IsString()
  task_type?: string;

  @ApiPropertyOptional({ description: 'Task result object' })
  @IsOptional()
  @IsObject()
  result?: JsonObject;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  operation_id?: string;

  @ApiPropertyOptional({ description: 'Human-readable status text' })
  @IsOptional()
  @IsString()
  message?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  context_id?: string;

  @ApiPropertyOptional({ example: 'media-buy' })
  @IsOptional()
  @IsString()
  domain?: string;
}
