import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsNumber,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { PAYMENT_METHODS, PaymentMethod } from '@invoicing/billing';
import { DATE_ONLY_PATTERN, LineItemDto } from './recurring-invoice.dto';

export class CreateInvoiceDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  customerId!: string;

  @ApiPropertyOptional({ example: 'Website redesign' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string;

  @ApiPropertyOptional({ description: 'Defaults to today', example: '2024-03-01' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'invoiceDate must be YYYY-MM-DD' })
  invoiceDate?: string;

  @ApiPropertyOptional({ example: 'Net 15', default: 'Net 30' })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  paymentTerms?: string;

  @ApiProperty({ type: [LineItemDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  lineItems!: LineItemDto[];

  @ApiPropertyOptional({ default: 0 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(100)
  taxRate?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;

  @ApiPropertyOptional({ description: 'Issue immediately instead of saving a draft' })
  @IsOptional()
  @IsBoolean()
  send?: boolean;
}

export class RecordPaymentDto {
  @ApiProperty({ example: 250.5 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  amount!: number;

  @ApiPropertyOptional({ description: 'Defaults to today', example: '2024-03-15' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'paymentDate must be YYYY-MM-DD' })
  paymentDate?: string;

  @ApiPropertyOptional({ enum: [...PAYMENT_METHODS], default: 'other' })
  @IsOptional()
  @IsIn(PAYMENT_METHODS)
  paymentMethod?: PaymentMethod;

  @ApiPropertyOptional({ example: 'CHK-1042' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  reference?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}

export class UpdatePaymentDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  amount?: number;

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

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;
}
