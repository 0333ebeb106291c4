import {
  MissingInitialRecordSeparatorError,
  decodeJSONSequence,
  encodeJSONSequence,
  parseJSONSequence,
  serializeJSONSequence,
} from '../mod';
import { bytes, bytewise, collectUntilError, joined, texts } from './helpers';

describe('parseJSONSequence', () => {
  it('splits records on RS, keeping the trailing LF', async () => {
    const source = bytewise('\x1e{"name":"Rover"}\n\x1e{"name":"Pancake"}\n');
    expect(await texts(parseJSONSequence(source))).toEqual([
      '{"name":"Rover"}\n',
      '{"name":"Pancake"}\n',
    ]);
  });

  it('skips empty records between consecutive separators', async () => {
    const source = [bytes('\x1e\x1e{"a":1}\n\x1e\x1e\x1e{"b":2}\n')];
    expect(await texts(parseJSONSequence(source))).toEqual(['{"a":1}\n', '{"b":2}\n']);
  });

  it('ignores a separator at the very end', async () => {
    expect(await texts(parseJSONSequence([bytes('\x1e1\n\x1e')]))).toEqual(['1\n']);
    expect(await texts(parseJSONSequence([bytes('\x1e')]))).toEqual([]);
  });

  it('yields nothing for an empty source', async () => {
    expect(await texts(parseJSONSequence([]))).toEqual([]);
  });

  it('rejects a stream that does not start with RS', async () => {
    const { values, error } = await collectUntilError(parseJSONSequence([bytes('{"a":1}\n')]));
    expect(values).toEqual([]);
    expect(error).toBeInstanceOf(MissingInitialRecordSeparatorError);
    expect(error).toBeInstanceOf(Error);
    if (error instanceof MissingInitialRecordSeparatorError) {
      expect(error.code).toBe('MISSING_INITIAL_RS');
      expect(error.name).toBe('MissingInitialRecordSeparatorError');
    }
  });

  it('looks past leading empty chunks for the first byte', async () => {
    const source = [new Uint8Array(0), new Uint8Array(0), bytes('x')];
    const { error } = await collectUntilError(parseJSONSequence(source));
    expect(error).toBeInstanceOf(MissingInitialRecordSeparatorError);
  });

  it('releases the source when it fails', async () => {
    let released = false;
    async function* source() {
      try {
        yield bytes('not a sequence');
        yield bytes('\x1e1\n');
      } finally {
        released = true;
      }
    }
    await collectUntilError(parseJSONSequence(source()));
    expect(released).toBe(true);
  });
});

describe('decodeJSONSequence', () => {
  it('decodes every record', async () => {
    const source = bytewise('\x1e{"name":"Rover"}\n\x1e[1,2]\n\x1etrue\n');
    const values: unknown[] = [];
    for await (const value of decodeJSONSequence(source)) values.push(value);
    expect(values).toEqual([{ name: 'Rover' }, [1, 2], true]);
  });

  it('fails on the first byte of a JSON Lines body', async () => {
    const iterator = decodeJSONSequence([bytes('{"a":1}\n')])[Symbol.asyncIterator]();
    await expect(iterator.next()).rejects.toThrow(
      'Missing an initial <RS> character, the bytes might not be a JSON Sequence.',
    );
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
  });
});

describe('encodeJSONSequence', () => {
  it('writes RS, the value and LF for each value', async () => {
    const output = await joined(encodeJSONSequence([{ name: 'Rover' }, 'x']));
    expect(output).toBe('\x1e{"name":"Rover"}\n\x1e"x"\n');
  });

  it('frames raw records', async () => {
    expect(await joined(serializeJSONSequence([bytes('1'), bytes('')]))).toBe('\x1e1\n\x1e\n');
  });

  it('decodes back to the same values', async () => {
    const values = [{ nested: { list: [null, 'a'] } }, -3.5, 'text'];
    const decoded: unknown[] = [];
    for await (const value of decodeJSONSequence(encodeJSONSequence(values))) decoded.push(value);
    expect(decoded).toEqual(values);
  });
});
