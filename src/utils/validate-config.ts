import { plainToClass } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { ClassConstructor } from 'class-transformer/types/interfaces';

function describeErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (constraint) => `${path}: ${constraint}`,
    );
    return [...own, ...describeErrors(error.children ?? [], path)];
  });
}

function validateConfig<T extends object>(
  config: Record<string, unknown>,
  envVariablesClass: ClassConstructor<T>,
): T {
  const validatedConfig = plainToClass(envVariablesClass, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(describeErrors(errors).join('; '));
  }
  return validatedConfig;
}

export default validateConfig;
