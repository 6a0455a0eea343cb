import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min
} from 'class-validator';

import { RunStatus } from '../common/interfaces';

const THREAD_ID = /^[A-Za-z0-9._:-]{1,128}$/;
const RUN_STATUSES: RunStatus[] = ['success', 'error', 'timeout'];

export class AgentRunRequestDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(10000)
  message!: string;

  @IsOptional()
  @IsString()
  @Matches(THREAD_ID, { message: 'Malformed thread id' })
  threadId?: string;

  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class AgentRunsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  skip = 0;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit = 100;

  @IsOptional()
  @IsString()
  @Matches(THREAD_ID, { message: 'Malformed thread id' })
  threadId?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  search?: string;

  @IsOptional()
  @IsIn(RUN_STATUSES)
  status?: RunStatus;
}
