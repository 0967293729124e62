import {
  IsArray,
  IsBoolean,
  IsDefined,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { JsonObject } from '../../../core/interfaces/common.types';

/**
 * Part of an A2A message or artifact
 */
export class A2aPartDto {
  @IsString()
  kind!: string;

  @ValidateIf((part: A2aPartDto) => part.kind === 'data' || part.data !== undefined)
  @IsObject()
  data?: JsonObject;

  @ValidateIf((part: A2aPartDto) => part.kind === 'text' || part.text !== undefined)
  @IsString()
  text?: string;

  @IsOptional()
  @IsObject()
  metadata?: JsonObject;
}

export class A2aMessageDto {
  @IsOptional()
  @IsString()
  message_id?: string;

  @IsOptional()
  @IsString()
  role?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => A2aPartDto)
  parts!: A2aPartDto[];
}

export class A2aArtifactDto {
  @IsOptional()
  @IsString()
  artifact_id?: string;

  @IsOptional()
  @IsString()
  name?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => A2aPartDto)
  parts!: A2aPartDto[];
}

export class A2aTaskStatusDto {
  @IsString()
  @IsNotEmpty()
  state!: string;

  @IsOptional()
  @IsString()
  timestamp?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => A2aMessageDto)
  message?: A2aMessageDto;
}

/**
 * A2A Task or TaskStatusUpdateEvent, after id aliases are folded into `id`
 * and `context_id`
 */
export class A2aTaskDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsOptional()
  @IsString()
  context_id?: string;

  @IsOptional()
  @IsString()
  kind?: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => A2aTaskStatusDto)
  status!: A2aTaskStatusDto;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => A2aArtifactDto)
  artifacts?: A2aArtifactDto[];

  @IsOptional()
  @IsBoolean()
  final?: boolean;

  @IsOptional()
  @IsObject()
  metadata?: JsonObject;
}
