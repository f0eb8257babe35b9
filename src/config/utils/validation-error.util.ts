import { TSchema } from '@sinclair/typebox';
import { AssertError } from '@sinclair/typebox/value';

const HELP_FOOTER = [
  '',
  'For help with configuration, see:',
  '- config.example.yaml file for reference',
  '- Schema definitions in src/config/schema/',
];

const SECTION_HINTS: ReadonlyArray<[prefix: string, hint: string]> = [
  [
    '/logger',
    'logger.level should be one of: error, warn, info, debug, verbose',
  ],
  [
    '/finder/sources',
    'every source needs a name and an http(s) url; format is one of: text, json, html-table',
  ],
  [
    '/checker',
    'checker timeouts are milliseconds and maxConcurrent is a worker count',
  ],
  ['/proxy', 'proxy should look like http://host:port'],
];

function getSchemaHint(path: string): string | undefined {
  const match = SECTION_HINTS.find(([prefix]) => path.startsWith(prefix));
  return match && `Tip: ${match[1]}`;
}

/** Description of the field, or of the first union variant that has one. */
function describeField(schema: TSchema): string | undefined {
  if (typeof schema.description === 'string') {
    return schema.description;
  }
  const variants: unknown = schema.anyOf;
  if (Array.isArray(variants)) {
    for (const variant of variants) {
      const description: unknown =
        typeof variant === 'object' && variant !== null
          ? Reflect.get(variant, 'description')
          : undefined;
      if (typeof description === 'string') {
        return description;
      }
    }
  }
  return undefined;
}

function schemaErrorMessage(error: AssertError, context: string): string {
  const details = error.error;
  if (!details) {
    return [
      `${context}.`,
      'Please verify your YAML configuration structure.',
      ...HELP_FOOTER,
    ].join('\n');
  }

  const field =
    details.path.replace(/^\//, '').replace(/\//g, '.') || 'unknown';
  const received =
    details.value !== undefined
      ? ` (received: ${JSON.stringify(details.value)})`
      : '';
  const description = describeField(details.schema);

  return [
    `YAML configuration validation failed: ${field}`,
    `Expected: ${details.message}${received}`,
    description && `Description: ${description}`,
    `Please set the correct value for the ${field} field in your YAML config.`,
    getSchemaHint(details.path),
    ...HELP_FOOTER,
  ]
    .filter((line): line is string => line !== undefined)
    .join('\n');
}

export function handleValidationError(error: unknown, context: string): never {
  if (error instanceof AssertError) {
    throw new Error(schemaErrorMessage(error, context), { cause: error });
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  throw new Error(`${context}\nError: ${errorMessage}`, { cause: error });
}
