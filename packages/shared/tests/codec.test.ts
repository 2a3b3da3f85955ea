import { describe, expect, it } from 'vitest';
import {
  decode,
  decodeResponseFrame,
  decodeStepRecord,
  encode,
  encodeFrame,
  encodeMessage,
  FrameError,
  FrameReader,
  type StepRecord,
} from '../src/index.js';

function frameOf(json: string): Buffer {
  return encodeFrame(Buffer.from(json, 'utf8'));
}

describe('encode', () => {
  it('should prefix the JSON payload with its little-endian length', () => {
    const frame = encode({ stepId: 3, waitSeconds: 5.5 });
    const json = '{"step_id":3,"wait_seconds":5.5}';

    expect(frame.readUInt32LE(0)).toBe(json.length);
    expect(frame.subarray(4).toString('utf8')).toBe(json);
  });
});

describe('decode', () => {
  it('should round-trip step records', () => {
    const records: StepRecord[] = [
      { stepId: 0, waitSeconds: 5 },
      { stepId: 1, waitSeconds: 6.25 },
      { stepId: 42, waitSeconds: 0.1 },
      { stepId: 7, waitSeconds: 5, payload: { note: 'opaque', items: [1, 2, 3] } },
    ];

    for (const record of records) {
      expect(decode(encode(record))).toEqual(record);
    }
  });

  it('should reject a truncated header', () => {
    expect(() => decode(Buffer.from([1, 0]))).toThrow(
      new FrameError('truncated frame header: got 2 of 4 bytes')
    );
  });

  it('should reject a truncated payload', () => {
    const frame = encode({ stepId: 1, waitSeconds: 5 });
    const truncated = frame.subarray(0, frame.length - 3);

    expect(() => decode(truncated)).toThrow(FrameError);
    expect(() => decode(truncated)).toThrow(/^truncated frame: expected/);
  });

  it('should reject trailing bytes', () => {
    const frame = Buffer.concat([encode({ stepId: 1, waitSeconds: 5 }), Buffer.from([0, 0])]);

    expect(() => decode(frame)).toThrow(new FrameError('2 trailing bytes after frame'));
  });

  it('should reject payloads that are not JSON', () => {
    expect(() => decode(frameOf('not json'))).toThrow(
      new FrameError('step record frame is not valid JSON')
    );
  });

  it('should reject records with a negative step id', () => {
    expect(() => decode(frameOf('{"step_id":-1,"wait_seconds":5}'))).toThrow(/step_id/);
  });

  it('should reject records without a wait', () => {
    expect(() => decode(frameOf('{"step_id":1}'))).toThrow(
      new FrameError('step record frame is invalid: wait_seconds: Required')
    );
  });

  it('should reject fractional step ids', () => {
    expect(() => decode(frameOf('{"step_id":1.5,"wait_seconds":5}'))).toThrow(FrameError);
  });

  it('should accept the largest safe step id', () => {
    expect(decode(frameOf('{"step_id":9007199254740991,"wait_seconds":5}'))).toEqual({
      stepId: Number.MAX_SAFE_INTEGER,
      waitSeconds: 5,
    });
  });

  it('should reject step ids beyond the largest safe integer', () => {
    expect(() => decode(frameOf('{"step_id":9007199254740992,"wait_seconds":5}'))).toThrow(
      new FrameError(
        'step record frame is invalid: step_id: Number must be less than or equal to 9007199254740991'
      )
    );
  });
});

describe('decodeResponseFrame', () => {
  it('should decode every response kind', () => {
    expect(decodeResponseFrame(encodeMessage({ code: 'ACK', stepId: 4 }))).toEqual({
      code: 'ACK',
      stepId: 4,
    });
    expect(
      decodeResponseFrame(
        encodeMessage({ code: 'ERR_TIMEOUT', kind: 'idle', stepId: null, message: 'quiet' })
      )
    ).toEqual({ code: 'ERR_TIMEOUT', kind: 'idle', stepId: null, message: 'quiet' });
  });

  it('should reject unknown response codes', () => {
    expect(() => decodeResponseFrame(frameOf('{"code":"NOPE"}'))).toThrow(FrameError);
    expect(() =>
      decodeResponseFrame(
        frameOf('{"code":"ERR_TIMEOUT","kind":"late","stepId":1,"message":""}')
      )
    ).toThrow(FrameError);
  });
});

describe('FrameReader', () => {
  it('should return null until a frame is complete', () => {
    const reader = new FrameReader();
    const frame = encode({ stepId: 1, waitSeconds: 5 });

    reader.push(frame.subarray(0, 2));
    expect(reader.next()).toBeNull();

    reader.push(frame.subarray(2, 10));
    expect(reader.next()).toBeNull();
    expect(reader.pendingBytes).toBe(10);

    reader.push(frame.subarray(10));
    const payload = reader.next();
    expect(payload).not.toBeNull();
    if (payload) {
      expect(decodeStepRecord(payload)).toEqual({ stepId: 1, waitSeconds: 5 });
    }
    expect(reader.pendingBytes).toBe(0);
  });

  it('should reassemble frames fed one byte at a time', () => {
    const reader = new FrameReader();
    const bytes = Buffer.concat([
      encode({ stepId: 0, waitSeconds: 5 }),
      encode({ stepId: 1, waitSeconds: 6 }),
    ]);
    const decoded: StepRecord[] = [];

    for (const byte of bytes) {
      reader.push(Uint8Array.of(byte));
      for (let payload = reader.next(); payload !== null; payload = reader.next()) {
        decoded.push(decodeStepRecord(payload));
      }
    }

    expect(decoded).toEqual([
      { stepId: 0, waitSeconds: 5 },
      { stepId: 1, waitSeconds: 6 },
    ]);
  });

  it('should split several frames delivered in one chunk', () => {
    const reader = new FrameReader();
    reader.push(
      Buffer.concat([
        encode({ stepId: 0, waitSeconds: 5 }),
        encode({ stepId: 1, waitSeconds: 5 }),
        encode({ stepId: 2, waitSeconds: 5 }).subarray(0, 5),
      ])
    );

    const first = reader.next();
    const second = reader.next();
    expect(first && decodeStepRecord(first).stepId).toBe(0);
    expect(second && decodeStepRecord(second).stepId).toBe(1);
    expect(reader.next()).toBeNull();
    expect(reader.pendingBytes).toBe(5);
  });

  it('should reject frames announcing more than the limit', () => {
    const reader = new FrameReader(16);
    const header = Buffer.alloc(4);
    header.writeUInt32LE(17, 0);
    reader.push(header);

    expect(() => reader.next()).toThrow(
      new FrameError('frame of 17 bytes exceeds the 16 byte limit')
    );
  });
});
