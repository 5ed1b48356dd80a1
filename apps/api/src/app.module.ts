import { Module } from '@nestjs/common';
import { JobQueue, jobStoreProvider } from '@pipeline/jobs';
import { HealthController } from './health.controller';
import { JobsController } from './jobs/jobs.controller';
import { JobsService } from './jobs/jobs.service';
import { AdminController } from './admin/admin.controller';
import { AdminService } from './admin/admin.service';

@Module({
  controllers: [HealthController, JobsController, AdminController],
  providers: [jobStoreProvider, JobQueue, JobsService, AdminService],
})
export class AppModule {}
