// src/audio/resampler.ts
// How it works: linear interpolation over interleaved PCM16 frames. The read position is kept
// as an exact rational (numerator over toRate) and carried with the previous chunk's last frame
// in ResamplerState, so consecutive chunks join without a seam.

import { log } from '../log';

export type ResamplerState = {
  readonly fromRate: number;
  readonly toRate: number;
  readonly channels: number;
  /** Next output position relative to the start of the next chunk, in 1/toRate input frames. */
  readonly positionNum: number;
  /** Last frame of the previous chunk (one sample per channel). */
  readonly lastFrame: readonly number[];
};

export interface ResampleResult {
  chunk: Buffer;
  state: ResamplerState | null;
  /** false when the chunk was passed through after a conversion failure. */
  ok: boolean;
}

const SUPPORTED_SAMPLE_WIDTH = 2;

function clampInt16(value: number): number {
  if (value > 32767) return 32767;
  if (value < -32768) return -32768;
  return value | 0;
}

function validate(
  chunk: Buffer,
  state: ResamplerState | null,
  fromRate: number,
  toRate: number,
  sampleWidth: number,
  channels: number,
): void {
  if (!Number.isInteger(fromRate) || !Number.isInteger(toRate) || fromRate <= 0 || toRate <= 0) {
    throw new Error(`invalid sample rates ${fromRate} -> ${toRate}`);
  }
  if (sampleWidth !== SUPPORTED_SAMPLE_WIDTH) {
    throw new Error(`unsupported sample width ${sampleWidth}`);
  }
  if (!Number.isInteger(channels) || channels < 1) {
    throw new Error(`invalid channel count ${channels}`);
  }
  const frameBytes = sampleWidth * channels;
  if (chunk.length % frameBytes !== 0) {
    throw new Error(`chunk length ${chunk.length} is not a multiple of the ${frameBytes}-byte frame`);
  }
  if (
    state &&
    (state.fromRate !== fromRate || state.toRate !== toRate || state.channels !== channels)
  ) {
    throw new Error('resampler state belongs to a different stream');
  }
}

function resampleLinear(
  chunk: Buffer,
  state: ResamplerState | null,
  fromRate: number,
  toRate: number,
  channels: number,
): { chunk: Buffer; state: ResamplerState } {
  const frameBytes = SUPPORTED_SAMPLE_WIDTH * channels;
  const frames = chunk.length / frameBytes;
  const lastFrame = state?.lastFrame;

  const sampleAt = (frameIndex: number, channel: number): number => {
    if (frameIndex < 0) {
      return lastFrame?.[channel] ?? chunk.readInt16LE(channel * SUPPORTED_SAMPLE_WIDTH);
    }
    return chunk.readInt16LE(frameIndex * frameBytes + channel * SUPPORTED_SAMPLE_WIDTH);
  };

  let positionNum = state?.positionNum ?? 0;
  const limitNum = (frames - 1) * toRate;
  const outputFrames = positionNum > limitNum ? 0 : Math.floor((limitNum - positionNum) / fromRate) + 1;
  const output = Buffer.alloc(outputFrames * frameBytes);

  for (let i = 0; i < outputFrames; i += 1) {
    const index = Math.floor(positionNum / toRate);
    const frac = (positionNum - index * toRate) / toRate;
    const nextIndex = Math.min(index + 1, frames - 1);
    for (let c = 0; c < channels; c += 1) {
      const sample0 = sampleAt(index, c);
      const sample1 = sampleAt(nextIndex, c);
      const value = clampInt16(Math.round(sample0 + (sample1 - sample0) * frac));
      output.writeInt16LE(value, i * frameBytes + c * SUPPORTED_SAMPLE_WIDTH);
    }
    positionNum += fromRate;
  }

  const tail: number[] = [];
  for (let c = 0; c < channels; c += 1) {
    tail.push(sampleAt(frames - 1, c));
  }

  return {
    chunk: output,
    state: {
      fromRate,
      toRate,
      channels,
      positionNum: positionNum - frames * toRate,
      lastFrame: tail,
    },
  };
}

/**
 * Converts one chunk of PCM16 audio between sample rates.
 *
 * Equal rates and empty chunks return the input untouched with the state as given.
 * A chunk that cannot be converted is returned as-is with the previous state (`ok: false`).
 */
export function convert(
  chunk: Buffer,
  state: ResamplerState | null,
  fromRate: number,
  toRate: number,
  sampleWidth: number = SUPPORTED_SAMPLE_WIDTH,
  channels = 1,
): ResampleResult {
  if (fromRate === toRate || chunk.length === 0) {
    return { chunk, state, ok: true };
  }

  try {
    validate(chunk, state, fromRate, toRate, sampleWidth, channels);
    return { ...resampleLinear(chunk, state, fromRate, toRate, channels), ok: true };
  } catch (error) {
    log.error(
      { err: error, event: 'resample_failed', from_rate: fromRate, to_rate: toRate, bytes: chunk.length },
      'resampling failed, passing chunk through',
    );
    return { chunk, state, ok: false };
  }
}

/** One direction of rate conversion with its own carried state. */
export class Resampler {
  public readonly fromRate: number;
  public readonly toRate: number;
  private readonly sampleWidth: number;
  private readonly channels: number;
  private readonly onFailure?: () => void;
  private state: ResamplerState | null = null;

  constructor(options: {
    fromRate: number;
    toRate: number;
    sampleWidth?: number;
    channels?: number;
    onFailure?: () => void;
  }) {
    this.fromRate = options.fromRate;
    this.toRate = options.toRate;
    this.sampleWidth = options.sampleWidth ?? SUPPORTED_SAMPLE_WIDTH;
    this.channels = options.channels ?? 1;
    this.onFailure = options.onFailure;
  }

  public process(chunk: Buffer): Buffer {
    const result = convert(chunk, this.state, this.fromRate, this.toRate, this.sampleWidth, this.channels);
    this.state = result.state;
    if (!result.ok) {
      this.onFailure?.();
    }
    return result.chunk;
  }

  public getState(): ResamplerState | null {
    return this.state;
  }

  public reset(): void {
    this.state = null;
  }
}
