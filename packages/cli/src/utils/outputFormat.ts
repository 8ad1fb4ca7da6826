import { ConfigError } from '@opbind/core';

export const OUTPUT_FORMATS = ['text', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(f => f === value);
  if (format === undefined) {
    throw new ConfigError(
      `Unknown output format "${value}"`,
      'ERR_CONFIG_INVALID',
      {},
      `Use one of: ${OUTPUT_FORMATS.join(', ')}`
    );
  }
  return format;
}
