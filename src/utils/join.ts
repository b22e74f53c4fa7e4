import { DelimitedWriterOption, JoinPart } from '../types/writer';
import { DelimitedWriter } from './DelimitedWriter';

export function join(parts: Iterable<JoinPart>, ...opts: DelimitedWriterOption[]): string {
  const writer = new DelimitedWriter(...opts);
  for (const part of parts) {
    if (typeof part === 'string') {
      writer.writeString(part);
    } else {
      writer.write(part);
    }
  }
  return writer.toString();
}
