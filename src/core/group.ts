import type { Readable, Writable } from 'node:stream';
import { Bucket } from './bucket.js';
import type { RateOpts } from './rate.js';
import { ThrottleStream, attachReader, attachWriter, type ThrottleStreamOptions } from '../stream/throttle-stream.js';

/**
 * One quota shared by any number of streams. Every stream created from a
 * group draws on the same bucket, so N concurrent transfers together move
 * no more than the group's rate.
 */
export class Group {
  readonly bucket: Bucket;

  constructor(rate: RateOpts) {
    this.bucket = new Bucket(rate);
  }

  get rate(): RateOpts {
    return this.bucket.rate;
  }

  /** Applies to every stream bound to this group, including ones mid-transfer. */
  setRate(rate: RateOpts): void {
    this.bucket.setRate(rate);
  }

  createStream(options: Omit<ThrottleStreamOptions, 'bucket' | 'rate'> = {}): ThrottleStream {
    return new ThrottleStream({ ...options, bucket: this.bucket });
  }

  newReader(source: Readable): Readable {
    return attachReader(source, this.createStream());
  }

  newWriter(destination: Writable): Writable {
    return attachWriter(destination, this.createStream());
  }
}
