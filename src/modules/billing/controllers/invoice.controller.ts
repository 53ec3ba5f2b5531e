/**
 * Invoice Controller
 * Invoices and the payments recorded against them
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { InvoiceBalanceService, InvoiceService } from '@invoicing/billing';
import { CreateInvoiceDto, RecordPaymentDto, UpdatePaymentDto } from '../dto/invoice.dto';

@ApiTags('Invoices')
@Controller('invoices')
export class InvoiceController {
  constructor(
    private readonly invoiceService: InvoiceService,
    private readonly invoiceBalanceService: InvoiceBalanceService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Create a one-off invoice' })
  async create(@Body() dto: CreateInvoiceDto) {
    return {
      success: true,
      data: await this.invoiceService.create(dto),
    };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an invoice with its payments' })
  @ApiResponse({ status: 404, description: 'Invoice not found' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const { invoice, payments } = await this.invoiceService.findOne(id);

    return {
      success: true,
      data: { ...invoice, payments },
    };
  }

  @Post(':id/send')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Issue a draft invoice' })
  async send(@Param('id', ParseUUIDPipe) id: string) {
    return {
      success: true,
      data: await this.invoiceService.send(id),
    };
  }

  @Post(':id/recalculate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Recompute amount paid, balance and status from payments' })
  async recalculate(@Param('id', ParseUUIDPipe) id: string) {
    return {
      success: true,
      data: await this.invoiceBalanceService.recalculate(id),
    };
  }

  @Post(':id/payments')
  @ApiOperation({ summary: 'Record a payment' })
  @ApiResponse({ status: 201, description: 'Payment recorded; invoice balance updated' })
  async recordPayment(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RecordPaymentDto,
  ) {
    const { payment, invoice } = await this.invoiceBalanceService.recordPayment(id, dto);

    return {
      success: true,
      data: payment,
      meta: { invoice },
    };
  }

  @Put('payments/:paymentId')
  @ApiOperation({ summary: 'Correct a recorded payment' })
  async updatePayment(
    @Param('paymentId', ParseUUIDPipe) paymentId: string,
    @Body() dto: UpdatePaymentDto,
  ) {
    const { payment, invoice } = await this.invoiceBalanceService.updatePayment(paymentId, dto);

    return {
      success: true,
      data: payment,
      meta: { invoice },
    };
  }

  @Delete('payments/:paymentId')
  @ApiOperation({ summary: 'Remove a recorded payment' })
  async deletePayment(@Param('paymentId', ParseUUIDPipe) paymentId: string) {
    const invoice = await this.invoiceBalanceService.deletePayment(paymentId);

    return {
      success: true,
      data: { deleted: true },
      meta: { invoice },
    };
  }
}
