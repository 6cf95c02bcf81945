// G.711 companding for the telephony leg. PCM16 buffers are little-endian.

export type TelephonyCodec = 'PCMU' | 'PCMA' | 'L16';

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

function clampInt16(value: number): number {
  if (value > 32767) return 32767;
  if (value < -32768) return -32768;
  return value | 0;
}

function muLawToPcmSample(uLawByte: number): number {
  const u = ~uLawByte & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  let sample = ((mantissa << 3) + MULAW_BIAS) << exponent;
  sample -= MULAW_BIAS;
  return clampInt16(sign ? -sample : sample);
}

function pcmToMuLawSample(pcm: number): number {
  let sample = clampInt16(pcm);
  const sign = sample < 0 ? 0x80 : 0;
  if (sign) sample = -sample;
  if (sample > MULAW_CLIP) sample = MULAW_CLIP;
  sample += MULAW_BIAS;

  let exponent = 7;
  for (let mask = 0x4000; (sample & mask) === 0 && exponent > 0; mask >>= 1) {
    exponent -= 1;
  }
  const mantissa = (sample >> (exponent + 3)) & 0x0f;
  return ~(sign | (exponent << 4) | mantissa) & 0xff;
}

function aLawToPcmSample(aLawByte: number): number {
  const a = aLawByte ^ 0x55;
  let t = (a & 0x0f) << 4;
  const seg = (a & 0x70) >> 4;
  switch (seg) {
    case 0:
      t += 8;
      break;
    case 1:
      t += 0x108;
      break;
    default:
      t += 0x108;
      t <<= seg - 1;
      break;
  }
  return a & 0x80 ? clampInt16(t) : clampInt16(-t);
}

const ALAW_SEGMENT_ENDS = [0x1f, 0x3f, 0x7f, 0xff, 0x1ff, 0x3ff, 0x7ff, 0xfff];

function pcmToALawSample(pcm: number): number {
  let sample = clampInt16(pcm) >> 3;
  let mask: number;
  if (sample >= 0) {
    mask = 0xd5;
  } else {
    mask = 0x55;
    sample = -sample - 1;
  }

  const seg = ALAW_SEGMENT_ENDS.findIndex((end) => sample <= end);
  if (seg === -1) {
    return 0x7f ^ mask;
  }
  let aval = seg << 4;
  if (seg < 2) {
    aval |= (sample >> 1) & 0x0f;
  } else {
    aval |= (sample >> seg) & 0x0f;
  }
  return (aval ^ mask) & 0xff;
}

export function decodeMuLaw(payload: Buffer): Buffer {
  const out = Buffer.alloc(payload.length * 2);
  for (let i = 0; i < payload.length; i += 1) {
    out.writeInt16LE(muLawToPcmSample(payload[i] ?? 0xff), i * 2);
  }
  return out;
}

export function encodeMuLaw(pcm16: Buffer): Buffer {
  const samples = Math.floor(pcm16.length / 2);
  const out = Buffer.alloc(samples);
  for (let i = 0; i < samples; i += 1) {
    out[i] = pcmToMuLawSample(pcm16.readInt16LE(i * 2));
  }
  return out;
}

export function decodeALaw(payload: Buffer): Buffer {
  const out = Buffer.alloc(payload.length * 2);
  for (let i = 0; i < payload.length; i += 1) {
    out.writeInt16LE(aLawToPcmSample(payload[i] ?? 0xd5), i * 2);
  }
  return out;
}

export function encodeALaw(pcm16: Buffer): Buffer {
  const samples = Math.floor(pcm16.length / 2);
  const out = Buffer.alloc(samples);
  for (let i = 0; i < samples; i += 1) {
    out[i] = pcmToALawSample(pcm16.readInt16LE(i * 2));
  }
  return out;
}

/** Wire payload → PCM16LE. L16 on the wire is network byte order (big-endian). */
export function decodeTelephonyPayload(codec: TelephonyCodec, payload: Buffer): Buffer {
  switch (codec) {
    case 'PCMU':
      return decodeMuLaw(payload);
    case 'PCMA':
      return decodeALaw(payload);
    case 'L16': {
      const out = Buffer.from(payload.subarray(0, payload.length - (payload.length % 2)));
      return out.swap16();
    }
  }
}

export function encodeTelephonyPayload(codec: TelephonyCodec, pcm16: Buffer): Buffer {
  switch (codec) {
    case 'PCMU':
      return encodeMuLaw(pcm16);
    case 'PCMA':
      return encodeALaw(pcm16);
    case 'L16': {
      const out = Buffer.from(pcm16.subarray(0, pcm16.length - (pcm16.length % 2)));
      return out.swap16();
    }
  }
}
