import { log } from '../log';
import {
  incBridgeChunksDropped,
  incBridgeChunksEnqueued,
  incResampleFailures,
  type BridgeDirection,
} from '../metrics';
import { BridgeQueue, DEFAULT_BRIDGE_QUEUE_CAPACITY, type TakeOptions } from './bridgeQueue';
import { Resampler } from './resampler';

/** A run of consecutive drops is logged on its first drop and then every this many drops. */
export const QUEUE_FULL_LOG_INTERVAL = 50;

export interface DuplexAudioBridgeOptions {
  telephonyRate?: number;
  aiInputRate?: number;
  aiOutputRate?: number;
  queueCapacity?: number;
  sampleWidth?: number;
  channels?: number;
}

export interface DuplexAudioBridgeStats {
  telephonyToAi: { queued: number; dropped: number };
  aiToTelephony: { queued: number; dropped: number };
}

/**
 * Moves audio both ways between the telephony leg and the AI session.
 *
 * Each direction has its own resampler and bounded queue; submit paths never wait, and a full
 * queue drops the incoming chunk (newest-first). Every drop is counted in the metric; the warning is
 * rate-limited per run of consecutive drops.
 */
export class DuplexAudioBridge {
  public readonly telephonyRate: number;
  public readonly aiInputRate: number;
  public readonly aiOutputRate: number;

  private readonly toAiResampler: Resampler;
  private readonly toTelephonyResampler: Resampler;
  private readonly toAiQueue: BridgeQueue;
  private readonly toTelephonyQueue: BridgeQueue;
  private readonly dropStreaks: Record<BridgeDirection, number> = { telephony_to_ai: 0, ai_to_telephony: 0 };

  constructor(options: DuplexAudioBridgeOptions = {}) {
    this.telephonyRate = options.telephonyRate ?? 8000;
    this.aiInputRate = options.aiInputRate ?? 16000;
    this.aiOutputRate = options.aiOutputRate ?? 24000;
    const capacity = options.queueCapacity ?? DEFAULT_BRIDGE_QUEUE_CAPACITY;

    this.toAiResampler = new Resampler({
      fromRate: this.telephonyRate,
      toRate: this.aiInputRate,
      sampleWidth: options.sampleWidth,
      channels: options.channels,
      onFailure: () => incResampleFailures('telephony_to_ai'),
    });
    this.toTelephonyResampler = new Resampler({
      fromRate: this.aiOutputRate,
      toRate: this.telephonyRate,
      sampleWidth: options.sampleWidth,
      channels: options.channels,
      onFailure: () => incResampleFailures('ai_to_telephony'),
    });
    this.toAiQueue = new BridgeQueue(capacity);
    this.toTelephonyQueue = new BridgeQueue(capacity);

    log.info(
      {
        event: 'audio_bridge_created',
        telephony_rate: this.telephonyRate,
        ai_input_rate: this.aiInputRate,
        ai_output_rate: this.aiOutputRate,
        queue_capacity: capacity,
      },
      'audio bridge created',
    );
  }

  public submitFromTelephony(chunk: Buffer): boolean {
    return this.submit(chunk, this.toAiResampler, this.toAiQueue, 'telephony_to_ai');
  }

  public submitFromAi(chunk: Buffer): boolean {
    return this.submit(chunk, this.toTelephonyResampler, this.toTelephonyQueue, 'ai_to_telephony');
  }

  public takeForAi(options?: TakeOptions): Promise<Buffer | null> {
    return this.toAiQueue.take(options);
  }

  public takeForTelephony(options?: TakeOptions): Promise<Buffer | null> {
    return this.toTelephonyQueue.take(options);
  }

  public tryTakeForTelephony(): Buffer | null {
    return this.toTelephonyQueue.tryTake();
  }

  public resetForNewCall(): void {
    this.toAiResampler.reset();
    this.toTelephonyResampler.reset();
    const discardedToAi = this.toAiQueue.drain();
    const discardedToTelephony = this.toTelephonyQueue.drain();
    this.dropStreaks.telephony_to_ai = 0;
    this.dropStreaks.ai_to_telephony = 0;

    log.debug(
      {
        event: 'audio_bridge_reset',
        discarded_telephony_to_ai: discardedToAi,
        discarded_ai_to_telephony: discardedToTelephony,
      },
      'audio bridge reset for new call',
    );
  }

  public stats(): DuplexAudioBridgeStats {
    return {
      telephonyToAi: { queued: this.toAiQueue.size(), dropped: this.toAiQueue.getDroppedCount() },
      aiToTelephony: {
        queued: this.toTelephonyQueue.size(),
        dropped: this.toTelephonyQueue.getDroppedCount(),
      },
    };
  }

  private submit(
    chunk: Buffer,
    resampler: Resampler,
    queue: BridgeQueue,
    direction: BridgeDirection,
  ): boolean {
    if (chunk.length === 0) {
      return false;
    }

    const converted = resampler.process(chunk);
    if (converted.length === 0) {
      return false;
    }

    if (!queue.offer(converted)) {
      incBridgeChunksDropped(direction);
      const streak = this.dropStreaks[direction] + 1;
      this.dropStreaks[direction] = streak;
      if (streak === 1 || streak % QUEUE_FULL_LOG_INTERVAL === 0) {
        log.warn(
          {
            event: 'audio_bridge_queue_full',
            direction,
            capacity: queue.capacity,
            consecutive_drops: streak,
            dropped_total: queue.getDroppedCount(),
          },
          'bridge queue full, dropping audio chunk',
        );
      }
      return false;
    }
    this.dropStreaks[direction] = 0;

    incBridgeChunksEnqueued(direction);
    return true;
  }
}
