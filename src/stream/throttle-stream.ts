import { Transform, type Readable, type TransformCallback, type TransformOptions, type Writable } from 'node:stream';
import { Bucket } from '../core/bucket.js';
import { UNLIMITED, type RateOpts } from '../core/rate.js';
import { acquireWait, bytesThrottled } from '../monitoring/metrics.js';

export interface ThrottleStreamOptions extends Omit<TransformOptions, 'objectMode' | 'readableObjectMode' | 'writableObjectMode' | 'transform' | 'flush'> {
  /** Shared bucket to draw from. Takes precedence over `rate`. */
  bucket?: Bucket;
  /** Rate for a private bucket. Defaults to unlimited. */
  rate?: RateOpts;
}

/**
 * Byte stream that lets chunks through no faster than its bucket allows.
 * Each chunk is forwarded in slices sized by what the bucket grants, so a
 * large write trickles out across several intervals.
 */
export class ThrottleStream extends Transform {
  readonly bucket: Bucket;
  private readonly aborter = new AbortController();

  constructor(options: ThrottleStreamOptions = {}) {
    const { bucket, rate, ...streamOptions } = options;
    super(streamOptions);
    this.bucket = bucket ?? new Bucket(rate ?? UNLIMITED);
  }

  setRate(rate: RateOpts): void {
    this.bucket.setRate(rate);
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.forward(chunk).then(
      () => callback(),
      (err: unknown) => callback(err instanceof Error ? err : new Error(String(err))),
    );
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.aborter.abort(error ?? new Error('Throttled stream destroyed'));
    callback(error);
  }

  private async forward(chunk: Buffer): Promise<void> {
    let offset = 0;
    while (offset < chunk.length) {
      const started = performance.now();
      const granted = await this.bucket.acquire(chunk.length - offset, { signal: this.aborter.signal });
      acquireWait.observe((performance.now() - started) / 1000);

      this.push(chunk.subarray(offset, offset + granted));
      bytesThrottled.inc(granted);
      offset += granted;
    }
  }
}

/** Pipe `source` through `throttle`; source errors destroy the throttle with the same error. */
export function attachReader(source: Readable, throttle: ThrottleStream): Readable {
  source.once('error', (err) => throttle.destroy(err));
  return source.pipe(throttle);
}

/** Pipe `throttle` into `destination`; destination errors surface on the throttle. */
export function attachWriter(destination: Writable, throttle: ThrottleStream): Writable {
  destination.once('error', (err) => throttle.destroy(err));
  throttle.pipe(destination);
  return throttle;
}

/** Readable side of `source`, limited to `rate`. */
export function newReader(source: Readable, rate: RateOpts): ThrottleStream {
  const throttle = new ThrottleStream({ rate });
  attachReader(source, throttle);
  return throttle;
}

/** Writable that forwards into `destination` at no more than `rate`. */
export function newWriter(destination: Writable, rate: RateOpts): ThrottleStream {
  const throttle = new ThrottleStream({ rate });
  attachWriter(destination, throttle);
  return throttle;
}
