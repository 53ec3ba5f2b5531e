/**
 * Recurring Invoice Controller
 * Manage recurring invoice definitions and inspect their instances
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RecurringInvoiceService } from '@invoicing/billing';
import { QueueService } from '../../queue/queue.service';
import {
  CancelRecurringInvoiceDto,
  CreateRecurringInvoiceDto,
  ListInstancesDto,
  ListRecurringInvoicesDto,
  PreviewRecurringInvoiceDto,
  UpdateInstanceStatusDto,
  UpdateRecurringInvoiceDto,
} from '../dto/recurring-invoice.dto';
import { MATERIALIZE_QUEUE } from '../jobs/queue-names';

@ApiTags('Recurring Invoices')
@Controller('recurring-invoices')
export class RecurringInvoiceController {
  constructor(
    private readonly recurringInvoiceService: RecurringInvoiceService,
    private readonly queueService: QueueService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Create a recurring invoice' })
  @ApiResponse({ status: 201, description: 'Created, with the first upcoming dates' })
  @ApiResponse({ status: 400, description: 'Invalid schedule or line items' })
  async create(@Body() dto: CreateRecurringInvoiceDto) {
    const { recurringInvoice, upcoming } = await this.recurringInvoiceService.create(dto);

    return {
      success: true,
      data: recurringInvoice,
      meta: { upcoming },
    };
  }

  @Get()
  @ApiOperation({ summary: 'List recurring invoices' })
  async list(@Query() query: ListRecurringInvoicesDto) {
    const page = query.page ?? 1;
    const pageSize = query.pageSize ?? 20;
    const { items, total } = await this.recurringInvoiceService.list({
      customerId: query.customerId,
      status: query.status,
      frequency: query.frequency,
      limit: pageSize,
      offset: (page - 1) * pageSize,
    });

    return {
      success: true,
      data: items,
      meta: {
        total,
        page,
        pageSize,
        totalPages: Math.ceil(total / pageSize),
      },
    };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a recurring invoice with recent instances and statistics' })
  @ApiResponse({ status: 404, description: 'Recurring invoice not found' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const details = await this.recurringInvoiceService.findOne(id);

    return {
      success: true,
      data: details,
    };
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update schedule, limits or invoice contents' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateRecurringInvoiceDto,
  ) {
    const recurringInvoice = await this.recurringInvoiceService.update(id, dto);

    return {
      success: true,
      data: recurringInvoice,
    };
  }

  @Post(':id/pause')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Pause an active recurring invoice' })
  async pause(@Param('id', ParseUUIDPipe) id: string) {
    return {
      success: true,
      data: await this.recurringInvoiceService.pause(id),
    };
  }

  @Post(':id/resume')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Resume a paused recurring invoice' })
  async resume(@Param('id', ParseUUIDPipe) id: string) {
    return {
      success: true,
      data: await this.recurringInvoiceService.resume(id),
    };
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a recurring invoice for good' })
  async cancel(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: CancelRecurringInvoiceDto,
  ) {
    const { recurringInvoice, cancelledInstances } = await this.recurringInvoiceService.cancel(
      id,
      query.cancelPending ?? false,
    );

    return {
      success: true,
      data: recurringInvoice,
      meta: { cancelledInstances },
    };
  }

  @Post(':id/preview')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Preview upcoming occurrence dates' })
  async preview(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: PreviewRecurringInvoiceDto,
  ) {
    const occurrences = await this.recurringInvoiceService.preview(
      id,
      query.count ?? 5,
      query.includeAmounts ?? true,
    );

    return {
      success: true,
      data: occurrences,
    };
  }

  @Post(':id/generate-next')
  @ApiOperation({ summary: 'Generate the next occurrence now and queue its invoice' })
  async generateNext(@Param('id', ParseUUIDPipe) id: string) {
    const occurrence = await this.recurringInvoiceService.generateNext(id);
    const jobId = await this.queueService.sendJob(
      MATERIALIZE_QUEUE,
      { instanceId: occurrence.instanceId },
      { singletonKey: occurrence.instanceId },
    );

    return {
      success: true,
      data: occurrence,
      meta: { jobId },
    };
  }

  @Get(':id/instances')
  @ApiOperation({ summary: 'List generated instances, newest first' })
  async findInstances(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ListInstancesDto,
  ) {
    const instances = await this.recurringInvoiceService.findInstances(id, {
      status: query.status,
      limit: query.limit ?? 50,
    });

    return {
      success: true,
      data: instances,
    };
  }

  @Patch('instances/:instanceId/status')
  @ApiOperation({ summary: 'Move an instance to another status' })
  @ApiResponse({ status: 400, description: 'Transition not allowed' })
  async updateInstanceStatus(
    @Param('instanceId', ParseUUIDPipe) instanceId: string,
    @Body() dto: UpdateInstanceStatusDto,
  ) {
    const instance = await this.recurringInvoiceService.updateInstanceStatus(
      instanceId,
      dto.status,
      dto.errorMessage,
    );

    return {
      success: true,
      data: instance,
    };
  }
}
