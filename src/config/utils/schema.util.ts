import { TLiteral, TUnion, Type } from '@sinclair/typebox';

export const variantsSchema = <T extends readonly string[]>(
  values: T,
  options?: {
    default?: T[number];
    description?: string;
    examples?: string[];
  },
): TUnion<TLiteral<T[number]>[]> =>
  Type.Union(
    values.map((value) => Type.Literal(value)),
    {
      ...(options?.default && { default: options.default }),
      ...(options?.description && { description: options.description }),
      ...(options?.examples && { examples: options.examples }),
    },
  );

export const nullableLimitSchema = (options: {
  minimum: number;
  maximum?: number;
  integer?: boolean;
  description: string;
  nullDescription: string;
}) =>
  Type.Union(
    [
      options.integer
        ? Type.Integer({
            minimum: options.minimum,
            ...(options.maximum !== undefined && { maximum: options.maximum }),
            description: options.description,
          })
        : Type.Number({
            minimum: options.minimum,
            ...(options.maximum !== undefined && { maximum: options.maximum }),
            description: options.description,
          }),
      Type.Null({ description: options.nullDescription }),
    ],
    {
      default: null,
      description: `${options.description}. Set to null to disable`,
    },
  );

export const httpUrlSchema = (options: {
  description: string;
  default?: string;
  examples?: string[];
}) =>
  Type.String({
    pattern: '^https?://.+',
    description: options.description,
    ...(options.default && { default: options.default }),
    ...(options.examples && { examples: options.examples }),
  });
