import fs from 'node:fs';
import { log } from '../log';

export const DEFAULT_SYSTEM_INSTRUCTION =
  'You are a helpful home assistant answering a phone call. You are concise and witty. ' +
  'Keep answers short enough to be spoken aloud.';

export const DEFAULT_GREETING_PROMPT = 'The call has just connected. Greet the caller.';

/**
 * Reads the system instruction from `filePath`. A missing path, an unreadable file or a blank file
 * all fall back to the built-in instruction.
 */
export function loadSystemInstruction(filePath?: string): string {
  if (!filePath) {
    return DEFAULT_SYSTEM_INSTRUCTION;
  }

  try {
    const text = fs.readFileSync(filePath, 'utf8').trim();
    if (text.length > 0) {
      log.info({ event: 'system_instruction_loaded', path: filePath, chars: text.length }, 'system instruction loaded');
      return text;
    }
    log.warn({ event: 'system_instruction_empty', path: filePath }, 'system instruction file is empty, using default');
  } catch (error) {
    log.warn(
      { err: error, event: 'system_instruction_unreadable', path: filePath },
      'failed to read system instruction, using default',
    );
  }
  return DEFAULT_SYSTEM_INSTRUCTION;
}
