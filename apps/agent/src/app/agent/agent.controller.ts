import { Body, Controller, Get, Param, Post, Query, Res } from '@nestjs/common';
import { Response } from 'express';

import { RateLimit } from '../admission/rate-limit.decorator';
import { AuthUser } from '../common/auth.types';
import { TRACE_ID_HEADER } from '../common/correlation-id.middleware';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import {
  AgentHealth,
  AgentRunRecord,
  InvocationResponse,
  PaginatedResponse
} from '../common/interfaces';
import { AgentRunRequestDto, AgentRunsQueryDto } from './agent.dto';
import { AgentService } from './agent.service';

@Controller('v1/agent')
export class AgentController {
  constructor(private readonly agentService: AgentService) {}

  @Post('run')
  @RateLimit('agent_run')
  public async run(
    @Body() body: AgentRunRequestDto,
    @CurrentUser() user: AuthUser,
    @Res({ passthrough: true }) res: Response
  ): Promise<InvocationResponse> {
    const result = await this.agentService.run(body, user);
    if (result.traceId) {
      res.setHeader(TRACE_ID_HEADER, result.traceId);
    }
    return result;
  }

  @Get('runs')
  @RateLimit('agent_history')
  public listRuns(
    @Query() query: AgentRunsQueryDto,
    @CurrentUser('userId') userId: string
  ): PaginatedResponse<AgentRunRecord> {
    return this.agentService.listRuns({
      userId,
      skip: query.skip,
      limit: query.limit,
      threadId: query.threadId,
      search: query.search,
      status: query.status
    });
  }

  @Get('runs/:runId')
  @RateLimit('agent_history')
  public getRun(
    @Param('runId') runId: string,
    @CurrentUser('userId') userId: string
  ): AgentRunRecord {
    return this.agentService.getRun(runId, userId);
  }

  @Get('health')
  public getHealth(): Promise<AgentHealth> {
    return this.agentService.getHealth();
  }
}
