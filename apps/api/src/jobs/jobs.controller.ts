import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { parseOrThrow } from '../validation/parse-or-throw';
import {
  enqueueBatchBodySchema,
  enqueueJobBodySchema,
  jobIdSchema,
} from '../validation/schemas';
import { JobsService } from './jobs.service';

@Controller('jobs')
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @HttpCode(201)
  @Post()
  async enqueue(@Body() body: unknown) {
    return this.jobsService.enqueue(parseOrThrow(enqueueJobBodySchema, body));
  }

  @HttpCode(201)
  @Post('batch')
  async enqueueBatch(@Body() body: unknown) {
    const { jobs } = parseOrThrow(enqueueBatchBodySchema, body);
    return this.jobsService.enqueueBatch(jobs);
  }

  @Get(':id')
  async getJob(@Param('id') id: unknown) {
    return this.jobsService.getJob(parseOrThrow(jobIdSchema, id));
  }

  @HttpCode(200)
  @Post(':id/cancel')
  async cancel(@Param('id') id: unknown) {
    return this.jobsService.cancel(parseOrThrow(jobIdSchema, id));
  }
}
