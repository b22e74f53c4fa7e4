import { join } from '../../utils/join';
import { withDelimiters, withStep } from '../../utils/DelimitedWriterOptions';

describe('join', () => {
  it('should join parts with the step', () => {
    expect(join(['a', 'b'], withStep('-'))).toBe('a-b');
  });

  it('should render only the prefix and suffix for no parts', () => {
    expect(join([], withDelimiters('(', ' ', ')'))).toBe('()');
  });

  it('should accept string and byte parts', () => {
    expect(join(['a', Uint8Array.from([0x62])], withDelimiters('(', ' ', ')'))).toBe('(a b)');
  });

  it('should keep empty parts', () => {
    expect(join(['', 'a', ''], withStep(','))).toBe(',a,');
  });
});
