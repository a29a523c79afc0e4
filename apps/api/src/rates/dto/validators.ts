import { buildMessage, ValidateBy, ValidationOptions } from 'class-validator';
import { isIsoDate } from '@exchangerates/shared';

export function IsIsoDate(options?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isIsoDate',
      validator: {
        validate: (v: unknown) => isIsoDate(v),
        defaultMessage: buildMessage(each => `${each}$property must be a calendar date as YYYY-MM-DD`, options),
      },
    },
    options,
  );
}

// open timeframe bounds are sent as null
export function IsIsoDateOrNull(options?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isIsoDateOrNull',
      validator: {
        validate: (v: unknown) => v === null || isIsoDate(v),
        defaultMessage: buildMessage(each => `${each}$property must be null or a calendar date as YYYY-MM-DD`, options),
      },
    },
    options,
  );
}
