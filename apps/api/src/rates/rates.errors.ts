import { InternalServerErrorException, NotFoundException } from '@nestjs/common';
import type { CurrenciesNotFound } from '@exchangerates/shared';

export class CurrenciesNotFoundException extends NotFoundException {
  constructor(readonly currencies: string[]) {
    super({ currencies_not_found: currencies } satisfies CurrenciesNotFound);
  }
}

export const noRates = () => new InternalServerErrorException('No rates available');
