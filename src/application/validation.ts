import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';
import { CommandValidationError } from '../domain/errors';

/**
 * Turns an untrusted payload into a validated DTO instance. Unknown keys are
 * rejected rather than stripped so typos in field names surface.
 */
export async function parseDto<T extends object>(type: ClassConstructor<T>, payload: unknown): Promise<T> {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new CommandValidationError(`${type.name} payload must be an object`);
  }

  const instance = plainToInstance(type, payload);
  const errors = await validate(instance, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new CommandValidationError(`invalid ${type.name}`, flattenErrors(errors));
  }

  return instance;
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = `${prefix}${error.property}`;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      message.startsWith(error.property) ? `${prefix}${message}` : `${path}: ${message}`
    );
    return [...own, ...flattenErrors(error.children ?? [], `${path}.`)];
  });
}
