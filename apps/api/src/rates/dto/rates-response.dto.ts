// OpenAPI shapes of the responses; the wire contract itself lives in @exchangerates/shared
import { ApiProperty } from '@nestjs/swagger';
import type { CurrenciesNotFound, IndexResponse, Rates, TimeframeResponse } from '@exchangerates/shared';

export class IndexResponseDto implements IndexResponse {
  @ApiProperty({ type: [String], example: ['AUD', 'EUR', 'USD'] })
  currencies!: string[];

  @ApiProperty({ type: [String], format: 'date', minItems: 2, maxItems: 2, example: ['1999-01-04', '2024-03-15'] })
  timeframe!: [string, string];
}

export class RatesDto implements Rates {
  @ApiProperty({ format: 'date', example: '2024-03-15' })
  date!: string;

  @ApiProperty({
    type: 'object',
    additionalProperties: { type: 'number', nullable: true },
    example: { EUR: 1, GBP: 0.8545, USD: 1.089 },
  })
  rates!: Record<string, number | null>;
}

export class TimeframeResponseDto implements TimeframeResponse {
  @ApiProperty({ type: [String], format: 'date', minItems: 2, maxItems: 2, example: ['2024-03-14', '2024-03-15'] })
  timeframe!: [string, string];

  @ApiProperty({ type: [RatesDto] })
  rates!: RatesDto[];
}

export class CurrenciesNotFoundDto implements CurrenciesNotFound {
  @ApiProperty({ type: [String], example: ['XYZ'] })
  currencies_not_found!: string[];
}
