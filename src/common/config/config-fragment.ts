import { Injectable } from '@nestjs/common';
import { validateSync } from 'class-validator';
import { ConfigValidationError } from './config-errors';

function validateFragment(fragment: object, name: string): void {
  const errors = validateSync(fragment);
  if (errors.length > 0) {
    throw new ConfigValidationError(
      name,
      errors.map((e) => e.property),
    );
  }
}

/**
 * # Base class for a group of settings
 *
 * Subclasses declare properties with `@UseEnv` and `class-validator`
 * constraints; the whole group is validated once on construction.
 */
@Injectable()
export abstract class ConfigFragment {
  constructor() {
    validateFragment(this, new.target.name);
  }
}
