import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  ParseUUIDPipe,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { PaymentPlanService } from '@invoicing/billing';
import { CreatePaymentPlanDto, PayInstallmentDto } from '../dto/payment-plan.dto';

@ApiTags('Payment Plans')
@Controller('payment-plans')
export class PaymentPlanController {
  constructor(private readonly paymentPlanService: PaymentPlanService) {}

  @Post()
  @ApiOperation({ summary: 'Put an invoice balance on installments' })
  @ApiResponse({ status: 409, description: 'Invoice already has an open plan' })
  async create(@Body() dto: CreatePaymentPlanDto) {
    return {
      success: true,
      data: await this.paymentPlanService.create(dto),
    };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a payment plan with its installments' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return {
      success: true,
      data: await this.paymentPlanService.findOne(id),
    };
  }

  @Post(':id/installments/:number/payments')
  @ApiOperation({ summary: 'Pay toward an installment' })
  async payInstallment(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('number', ParseIntPipe) installmentNumber: number,
    @Body() dto: PayInstallmentDto,
  ) {
    return {
      success: true,
      data: await this.paymentPlanService.payInstallment(id, installmentNumber, dto),
    };
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a payment plan' })
  async cancel(@Param('id', ParseUUIDPipe) id: string) {
    return {
      success: true,
      data: await this.paymentPlanService.cancel(id),
    };
  }
}
