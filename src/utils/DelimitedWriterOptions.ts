import { DelimitedWriterOption, DelimitedWriterOptions } from '../types/writer';

export function withPrefix(prefix: string): DelimitedWriterOption {
  return options => {
    options.prefix = prefix;
  };
}

/** Sets the delimiter written between consecutive writes. */
export function withStep(step: string): DelimitedWriterOption {
  return options => {
    options.step = step;
  };
}

export function withSuffix(suffix: string): DelimitedWriterOption {
  return options => {
    options.suffix = suffix;
  };
}

export function withDelimiters(prefix: string, step: string, suffix: string): DelimitedWriterOption {
  return options => {
    options.prefix = prefix;
    options.step = step;
    options.suffix = suffix;
  };
}

export function resolveOptions(opts: DelimitedWriterOption[]): Readonly<DelimitedWriterOptions> {
  const options: DelimitedWriterOptions = { prefix: '', step: '', suffix: '' };
  for (const opt of opts) {
    opt(options);
  }
  return Object.freeze(options);
}
