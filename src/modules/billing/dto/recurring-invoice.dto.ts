/**
 * Recurring Invoice DTOs
 * Request payloads for recurring invoice definitions and their instances
 */

import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Transform, TransformFnParams, Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  INSTANCE_STATUSES,
  InstanceStatus,
  MAX_PREVIEW_COUNT,
  RECURRENCE_FREQUENCIES,
  RECURRENCE_STATUSES,
  RecurrenceFrequency,
  RecurrenceStatus,
} from '@invoicing/billing';

export const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Reads the raw query value; implicit conversion turns "false" into true
export const toBoolean = ({ obj, key }: TransformFnParams): boolean => {
  const raw: unknown = obj[key];
  return raw === true || raw === 'true' || raw === '1';
};

export class LineItemDto {
  @ApiProperty({ example: 'Monthly retainer' })
  @IsString()
  @MaxLength(500)
  description!: string;

  @ApiPropertyOptional({ example: 1, default: 1 })
  @IsOptional()
  @IsNumber()
  @Min(0.0001)
  quantity?: number;

  @ApiProperty({ example: 1500 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  unitPrice!: number;
}

export class RecurrenceScheduleDto {
  @ApiProperty({ enum: [...RECURRENCE_FREQUENCIES], example: 'monthly' })
  @IsIn(RECURRENCE_FREQUENCIES)
  frequency!: RecurrenceFrequency;

  @ApiPropertyOptional({
    description: 'Number of periods between occurrences',
    example: 1,
    default: 1,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  interval?: number;
}

export class CreateRecurringInvoiceDto {
  @ApiProperty({ format: 'uuid' })
  @IsUUID()
  customerId!: string;

  @ApiPropertyOptional({ format: 'uuid' })
  @IsOptional()
  @IsUUID()
  templateId?: string;

  @ApiProperty({ type: RecurrenceScheduleDto })
  @ValidateNested()
  @Type(() => RecurrenceScheduleDto)
  schedule!: RecurrenceScheduleDto;

  @ApiProperty({ example: '2024-01-31' })
  @Matches(DATE_ONLY_PATTERN, { message: 'startDate must be YYYY-MM-DD' })
  startDate!: string;

  @ApiPropertyOptional({ example: '2024-12-31' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'endDate must be YYYY-MM-DD' })
  endDate?: string;

  @ApiPropertyOptional({ example: 12 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxOccurrences?: number;

  @ApiProperty({ type: [LineItemDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  lineItems!: LineItemDto[];

  @ApiPropertyOptional({ description: 'Percent, 0-100', example: 8.25, default: 0 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(100)
  taxRate?: number;

  @ApiPropertyOptional({ example: 'Net 30', default: 'Net 30' })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  paymentTerms?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  autoSend?: boolean;

  @ApiPropertyOptional({ type: Object })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

export class UpdateRecurringInvoiceDto {
  @ApiPropertyOptional({ type: RecurrenceScheduleDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => RecurrenceScheduleDto)
  schedule?: RecurrenceScheduleDto;

  @ApiPropertyOptional({ example: '2024-12-31', nullable: true })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'endDate must be YYYY-MM-DD' })
  endDate?: string | null;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxOccurrences?: number | null;

  @ApiPropertyOptional({ type: [LineItemDto] })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  lineItems?: LineItemDto[];

  @ApiPropertyOptional()
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(100)
  taxRate?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(50)
  paymentTerms?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  notes?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  autoSend?: boolean;
}

export class ListRecurringInvoicesDto {
  @ApiPropertyOptional({ format: 'uuid' })
  @IsOptional()
  @IsUUID()
  customerId?: string;

  @ApiPropertyOptional({ enum: [...RECURRENCE_STATUSES] })
  @IsOptional()
  @IsIn(RECURRENCE_STATUSES)
  status?: RecurrenceStatus;

  @ApiPropertyOptional({ enum: [...RECURRENCE_FREQUENCIES] })
  @IsOptional()
  @IsIn(RECURRENCE_FREQUENCIES)
  frequency?: RecurrenceFrequency;

  @ApiPropertyOptional({ example: 1, default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number = 1;

  @ApiPropertyOptional({ example: 20, default: 20 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  pageSize?: number = 20;
}

export class CancelRecurringInvoiceDto {
  @ApiPropertyOptional({
    description: 'Also cancel instances not yet turned into invoices',
    default: false,
  })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  cancelPending?: boolean = false;
}

export class PreviewRecurringInvoiceDto {
  @ApiPropertyOptional({ example: 5, default: 5, maximum: MAX_PREVIEW_COUNT })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PREVIEW_COUNT)
  count?: number = 5;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  includeAmounts?: boolean = true;
}

export class ListInstancesDto {
  @ApiPropertyOptional({ enum: [...INSTANCE_STATUSES] })
  @IsOptional()
  @IsIn(INSTANCE_STATUSES)
  status?: InstanceStatus;

  @ApiPropertyOptional({ example: 50, default: 50 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number = 50;
}

export class UpdateInstanceStatusDto {
  @ApiProperty({ enum: [...INSTANCE_STATUSES] })
  @IsIn(INSTANCE_STATUSES)
  status!: InstanceStatus;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  errorMessage?: string;
}
