import { IsOptional, IsUUID, Matches } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { DATE_ONLY_PATTERN } from './recurring-invoice.dto';

/**
 * Payload of the scheduler and overdue sweep jobs, and body of their
 * manual triggers
 */
export class RunDateDto {
  @ApiPropertyOptional({ description: 'Run as of this date; defaults to today', example: '2024-03-01' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'asOf must be YYYY-MM-DD' })
  asOf?: string;
}

export class MaterializeInstanceJobDto {
  @IsUUID()
  instanceId!: string;
}
