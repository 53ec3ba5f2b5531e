import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  MAX_INSTALLMENTS,
  MIN_INSTALLMENTS,
  PAYMENT_METHODS,
  PAYMENT_PLAN_FREQUENCIES,
  PaymentMethod,
  PaymentPlanFrequency,
} from '@invoicing/billing';
import { DATE_ONLY_PATTERN } from './recurring-invoice.dto';

export class CreatePaymentPlanDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  invoiceId!: string;

  @ApiPropertyOptional({ example: 100, default: 0 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  downPayment?: number;

  @ApiProperty({ minimum: MIN_INSTALLMENTS, maximum: MAX_INSTALLMENTS, example: 3 })
  @IsInt()
  @Min(MIN_INSTALLMENTS)
  @Max(MAX_INSTALLMENTS)
  installmentCount!: number;

  @ApiProperty({ enum: [...PAYMENT_PLAN_FREQUENCIES], example: 'monthly' })
  @IsIn(PAYMENT_PLAN_FREQUENCIES)
  frequency!: PaymentPlanFrequency;

  @ApiPropertyOptional({ description: 'First installment due date; defaults to today' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'startDate must be YYYY-MM-DD' })
  startDate?: string;

  @ApiPropertyOptional({ enum: [...PAYMENT_METHODS], description: 'Used for the down payment' })
  @IsOptional()
  @IsIn(PAYMENT_METHODS)
  paymentMethod?: PaymentMethod;
}

export class PayInstallmentDto {
  @ApiProperty({ example: 300 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  amount!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'paymentDate must be YYYY-MM-DD' })
  paymentDate?: string;

  @ApiPropertyOptional({ enum: [...PAYMENT_METHODS] })
  @IsOptional()
  @IsIn(PAYMENT_METHODS)
  paymentMethod?: PaymentMethod;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  reference?: string;
}
