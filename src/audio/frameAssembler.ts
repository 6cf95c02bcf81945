// src/audio/frameAssembler.ts
// How it works: adapts the telephony engine's fixed 20 ms pull to the bridge's variable-size push.
// Capture frames go straight to the bridge. Playback audio accumulates in a PlaybackBuffer and each
// frame request drains exactly one frame from the front, or returns silence without touching the
// residue when less than a frame is buffered.

import { log } from '../log';
import { incPlaybackFrames } from '../metrics';
import type { MediaPort } from '../telephony/types';
import type { DuplexAudioBridge } from './duplexAudioBridge';

/**
 * Growable byte FIFO. Every mutation is a synchronous method, so on the single event loop an
 * append and a frame drain can never interleave.
 */
export class PlaybackBuffer {
  private chunks: Buffer[] = [];
  private headOffset = 0;
  private length = 0;

  public append(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  /** Removes and returns `size` bytes from the front, or null when fewer are buffered. */
  public take(size: number): Buffer | null {
    if (size <= 0 || this.length < size) {
      return null;
    }

    const out = Buffer.alloc(size);
    let written = 0;
    while (written < size) {
      const head = this.chunks[0];
      if (!head) break;
      const available = head.length - this.headOffset;
      const count = Math.min(available, size - written);
      head.copy(out, written, this.headOffset, this.headOffset + count);
      written += count;
      if (count === available) {
        this.chunks.shift();
        this.headOffset = 0;
      } else {
        this.headOffset += count;
      }
    }

    this.length -= size;
    return out;
  }

  public clear(): void {
    this.chunks = [];
    this.headOffset = 0;
    this.length = 0;
  }

  public size(): number {
    return this.length;
  }
}

export interface FrameAssemblerOptions {
  bridge: DuplexAudioBridge;
  sampleRate?: number;
  frameTimeMs?: number;
  bytesPerSample?: number;
  logContext?: Record<string, unknown>;
}

export class FrameAssembler implements MediaPort {
  public readonly sampleRate: number;
  public readonly frameTimeMs: number;
  public readonly samplesPerFrame: number;
  public readonly bytesPerFrame: number;

  private readonly bridge: DuplexAudioBridge;
  private readonly buffer = new PlaybackBuffer();
  private readonly logContext: Record<string, unknown>;
  private audioFrames = 0;
  private silenceFrames = 0;

  constructor(options: FrameAssemblerOptions) {
    this.bridge = options.bridge;
    this.sampleRate = options.sampleRate ?? 8000;
    this.frameTimeMs = options.frameTimeMs ?? 20;
    this.samplesPerFrame = Math.floor((this.sampleRate * this.frameTimeMs) / 1000);
    this.bytesPerFrame = this.samplesPerFrame * (options.bytesPerSample ?? 2);
    this.logContext = options.logContext ?? {};
  }

  public onFrameReceived(frame: Buffer): void {
    if (frame.length === 0) return;
    this.bridge.submitFromTelephony(frame);
  }

  public onFrameRequested(): Buffer {
    return this.requestFrame();
  }

  public requestFrame(): Buffer {
    const frame = this.buffer.take(this.bytesPerFrame);
    if (frame) {
      this.audioFrames += 1;
      incPlaybackFrames('audio');
      return frame;
    }

    this.silenceFrames += 1;
    incPlaybackFrames('silence');
    return Buffer.alloc(this.bytesPerFrame);
  }

  public appendPlaybackAudio(chunk: Buffer): void {
    this.buffer.append(chunk);
  }

  public clear(): void {
    const discarded = this.buffer.size();
    this.buffer.clear();
    if (discarded > 0) {
      log.debug(
        { event: 'playback_buffer_cleared', discarded_bytes: discarded, ...this.logContext },
        'playback buffer cleared',
      );
    }
  }

  public bufferedBytes(): number {
    return this.buffer.size();
  }

  public getFrameCounts(): { audio: number; silence: number } {
    return { audio: this.audioFrames, silence: this.silenceFrames };
  }
}
