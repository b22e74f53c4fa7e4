export * from './types/writer';
export { DelimitedWriter, createDelimitedWriter } from './utils/DelimitedWriter';
export { withPrefix, withStep, withSuffix, withDelimiters } from './utils/DelimitedWriterOptions';
export { join } from './utils/join';
export { NegativeGrowthException } from './utils/NegativeGrowthException';
export { StringBuilder } from './utils/StringBuilder';
export { Logger, LogLevel, parseLogLevel } from './utils/Logger';
