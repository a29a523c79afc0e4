// Rates endpoints. Bodies are validated by the global ValidationPipe before they get here.
import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiInternalServerErrorResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { RatesService } from './rates.service';
import { RatesRequestDto, TimeframeRequestDto } from './dto/rates-request.dto';
import { CurrenciesNotFoundDto, IndexResponseDto, RatesDto, TimeframeResponseDto } from './dto/rates-response.dto';

@ApiTags('rates')
@ApiInternalServerErrorResponse({ description: 'No rates available' })
@Controller()
export class RatesController {
  constructor(private readonly svc: RatesService) {}

  @Get()
  @ApiOperation({ summary: 'Available currencies and the timeframe of the dataset' })
  @ApiOkResponse({ type: IndexResponseDto })
  index() {
    return this.svc.index();
  }

  @Get('rates')
  @ApiOperation({ summary: 'Latest EUR rates for every currency' })
  @ApiOkResponse({ type: RatesDto })
  latest() {
    return this.svc.rates();
  }

  @Post('rates')
  @HttpCode(200)
  @ApiOperation({ summary: 'Rates for a day, against a base currency' })
  @ApiOkResponse({ type: RatesDto })
  @ApiBadRequestResponse({ description: 'Malformed date or currency code' })
  @ApiNotFoundResponse({ type: CurrenciesNotFoundDto })
  rates(@Body() body: RatesRequestDto) {
    return this.svc.rates(body);
  }

  @Post('rates/timeframe')
  @HttpCode(200)
  @ApiOperation({ summary: 'Rates for every publication day within a timeframe' })
  @ApiOkResponse({ type: TimeframeResponseDto })
  @ApiBadRequestResponse({ description: 'Malformed timeframe, or start after end' })
  @ApiNotFoundResponse({ type: CurrenciesNotFoundDto })
  timeframe(@Body() body: TimeframeRequestDto) {
    return this.svc.timeframe(body);
  }
}
