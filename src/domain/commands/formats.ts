import { ValidateIf } from 'class-validator';

export const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const CURRENCY_CODE = /^[A-Z]{3}$/;

/**
 * Like `@IsOptional()`, but only an absent key skips the other constraints;
 * an explicit `null` is validated and rejected.
 */
export const IsOmittable = (): PropertyDecorator =>
  ValidateIf((_object: object, value: unknown) => value !== undefined);
