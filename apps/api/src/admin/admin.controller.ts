import { Body, Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { parseOrThrow } from '../validation/parse-or-throw';
import {
  cleanupBodySchema,
  deadLetterQuerySchema,
  jobIdSchema,
  retryJobBodySchema,
} from '../validation/schemas';
import { AdminService } from './admin.service';

@Controller('admin')
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  @Get('dead-letter')
  async getDeadLetterJobs(@Query() query: unknown) {
    const filters = parseOrThrow(deadLetterQuerySchema, query);
    return this.adminService.getDeadLetterJobs({
      operationType: filters.operation_type,
      limit: filters.limit,
    });
  }

  @HttpCode(200)
  @Post('jobs/:id/retry')
  async retryJob(@Param('id') id: unknown, @Body() body: unknown) {
    const jobId = parseOrThrow(jobIdSchema, id);
    const { reset_retry_count } = parseOrThrow(retryJobBodySchema, body);
    return this.adminService.retryJob(jobId, reset_retry_count);
  }

  @Get('stats')
  async getStats() {
    return this.adminService.getStats();
  }

  @HttpCode(200)
  @Post('cleanup')
  async cleanup(@Body() body: unknown) {
    const { older_than_days } = parseOrThrow(cleanupBodySchema, body);
    return this.adminService.cleanup(older_than_days);
  }
}
