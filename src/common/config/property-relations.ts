import {
  ValidateBy,
  ValidationArguments,
  ValidationOptions,
} from 'class-validator';

type Relation = 'lessThan' | 'atMost';

function compare(relation: Relation, value: number, other: number): boolean {
  return relation === 'lessThan' ? value < other : value <= other;
}

function relatedTo(
  relation: Relation,
  property: string,
  options?: ValidationOptions,
): PropertyDecorator {
  const wording = relation === 'lessThan' ? 'less than' : 'at most';

  return ValidateBy(
    {
      name: relation,
      constraints: [property],
      validator: {
        validate: (value: unknown, args?: ValidationArguments): boolean => {
          const other: unknown = args ? Reflect.get(args.object, property) : undefined;
          return (
            typeof value === 'number' &&
            typeof other === 'number' &&
            compare(relation, value, other)
          );
        },
        defaultMessage: (args?: ValidationArguments): string =>
          `${args?.property ?? 'value'} must be ${wording} ${property}`,
      },
    },
    options,
  );
}

/**
 * Numeric property must be strictly below another property of the same object
 */
export function IsLessThanProperty(
  property: string,
  options?: ValidationOptions,
): PropertyDecorator {
  return relatedTo('lessThan', property, options);
}

export function IsAtMostProperty(
  property: string,
  options?: ValidationOptions,
): PropertyDecorator {
  return relatedTo('atMost', property, options);
}
