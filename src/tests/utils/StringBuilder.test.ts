import { StringBuilder } from '../../utils/StringBuilder';
import { NegativeGrowthException } from '../../utils/NegativeGrowthException';

describe('StringBuilder', () => {
  let builder: StringBuilder;

  beforeEach(() => {
    builder = new StringBuilder();
  });

  it('should start empty', () => {
    expect(builder.len()).toBe(0);
    expect(builder.cap()).toBe(0);
    expect(builder.toString()).toBe('');
  });

  it('should grow to twice the capacity plus the request', () => {
    builder.grow(10);
    expect(builder.cap()).toBe(10);

    builder.writeString('hello');
    expect(builder.len()).toBe(5);
    expect(builder.cap()).toBe(10);
  });

  it('should not reallocate when the request fits', () => {
    builder.writeString('ab');
    expect(builder.cap()).toBe(32);

    builder.grow(10);
    expect(builder.cap()).toBe(32);

    builder.grow(40);
    expect(builder.cap()).toBe(104);
    expect(builder.toString()).toBe('ab');
  });

  it('should at least double the capacity when an append overflows', () => {
    builder.grow(10);
    builder.writeString('hello');
    builder.writeString('world!');

    expect(builder.cap()).toBe(32);
    expect(builder.toString()).toBe('helloworld!');
  });

  it('should append bytes and single bytes', () => {
    expect(builder.write(Uint8Array.from([0x68, 0x69]))).toBe(2);
    builder.writeByte(0x21);

    expect(builder.toBuffer()).toEqual(Buffer.from('hi!'));
  });

  it('should return a copy from toBuffer', () => {
    builder.writeString('abc');
    const copy = builder.toBuffer();
    copy[0] = 0x7a;

    expect(builder.toString()).toBe('abc');
  });

  it('should drop the buffer on reset', () => {
    builder.writeString('abc');
    builder.reset();

    expect(builder.len()).toBe(0);
    expect(builder.cap()).toBe(0);
    expect(builder.toString()).toBe('');
  });

  it('should reject a negative grow', () => {
    let caught: unknown;
    try {
      builder.grow(-5);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NegativeGrowthException);
    expect(caught).toMatchObject({ name: 'NegativeGrowthException', requested: -5 });
  });

  it('should reject a growth that is not an integer', () => {
    expect(() => builder.grow(NaN)).toThrow(RangeError);
    expect(() => builder.grow(1.5)).toThrow(RangeError);
    expect(builder.cap()).toBe(0);
  });
});
