import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Protocol, TaskStatus } from '../../core/domain/enums';
import { TaskDataKind } from '../../core/interfaces/common.types';

/**
 * Metadata block of a task result response
 */
export class TaskResultMetadataDto {
  @ApiProperty({ example: 'task_123' })
  task_id!: string;

  @ApiProperty({
    description: 'Operation id taken from the webhook URL',
    example: 'op_456',
  })
  operation_id!: string;

  @ApiProperty({ enum: Protocol, example: Protocol.MCP })
  protocol!: Protocol;

  @ApiPropertyOptional({ example: 'ctx_789' })
  context_id?: string;

  @ApiPropertyOptional({ example: 'Found 3 products' })
  message?: string;

  @ApiPropertyOptional({ example: '2025-01-15T10:00:00Z' })
  timestamp?: string;
}

/**
 * Response DTO for webhook processing
 */
export class TaskResultResponseDto {
  @ApiProperty({
    description: 'Task completed without an error message',
    example: true,
  })
  success!: boolean;

  @ApiProperty({ enum: TaskStatus, example: TaskStatus.COMPLETED })
  status!: TaskStatus;

  @ApiPropertyOptional({
    description: 'Task result (typed when it matched the response model)',
    type: 'object',
    additionalProperties: true,
    nullable: true,
  })
  data!: unknown;

  @ApiProperty({
    enum: ['typed', 'raw', 'none'],
    description: 'How `data` was produced',
    example: 'typed',
  })
  dataKind!: TaskDataKind;

  @ApiPropertyOptional({
    description: 'First error message for failed or input-required tasks',
    nullable: true,
    example: null,
  })
  error!: string | null;

  @ApiProperty({ type: TaskResultMetadataDto })
  metadata!: TaskResultMetadataDto;
}
