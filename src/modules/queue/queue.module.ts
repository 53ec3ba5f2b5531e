/**
 * Queue Module
 * Provides job queue functionality using pg-boss
 */

import { Module, Global } from '@nestjs/common';
import { QueueService } from './queue.service';

@Global()
@Module({
  providers: [QueueService],
  exports: [QueueService],
})
export class QueueModule {}
