import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ArrayMaxSize, ArrayMinSize, IsArray, IsOptional, Matches } from 'class-validator';
import { CURRENCY_CODE } from '@exchangerates/shared';
import { IsIsoDate, IsIsoDateOrNull } from './validators';

export class ConversionDto {
  @ApiPropertyOptional({ description: 'Base currency, EUR when omitted', example: 'USD', pattern: CURRENCY_CODE.source })
  @IsOptional()
  @Matches(CURRENCY_CODE)
  from?: string;

  @ApiPropertyOptional({ description: 'Currencies to return, all when omitted or empty', type: [String], example: ['GBP', 'JPY'] })
  @IsOptional()
  @IsArray()
  @Matches(CURRENCY_CODE, { each: true })
  to?: string[];
}

export class RatesRequestDto extends ConversionDto {
  @ApiPropertyOptional({ description: 'Day to serve; the previous publication when the ECB published nothing that day', format: 'date', example: '2024-03-15' })
  @IsOptional()
  @IsIsoDate()
  date?: string;
}

export class TimeframeRequestDto extends ConversionDto {
  @ApiProperty({
    description: 'Inclusive [start, end]; null leaves that side open',
    type: 'array',
    items: { type: 'string', format: 'date', nullable: true },
    minItems: 2,
    maxItems: 2,
    example: ['2024-01-01', null],
  })
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsIsoDateOrNull({ each: true })
  timeframe!: Array<string | null>;
}
