import { Logger } from '../core/Logger';
import { DIALOGUE_TIMING, type DialogueTiming } from '../config/tuning';

export type Speaker = 'Player' | 'Boss_Anonymous' | 'Boss_Full';

export interface DialogueLine {
  speaker: Speaker;
  text: string;
}

export interface DialogueSequence {
  id: string;
  lines: DialogueLine[];
}

/** Host-side text box / portrait UI. The core only tells it what to show. */
export interface DialoguePresenter {
  present(sequence: DialogueSequence): void;
}

const SPEAKERS: readonly Speaker[] = ['Player', 'Boss_Anonymous', 'Boss_Full'];
/** Slack added on top of the estimate so the gate never closes mid-line. */
const ESTIMATE_PADDING_SEC = 0.2;
const FALLBACK_TYPING_SPEED = 0.05;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isSpeaker(v: unknown): v is Speaker {
  return typeof v === 'string' && SPEAKERS.some(s => s === v);
}

function parseLine(raw: unknown, where: string): DialogueLine | null {
  if (!isRecord(raw)) {
    Logger.warn(`[DialogueDatabase] ${where}: line is not an object`);
    return null;
  }
  const { speaker, text } = raw;
  if (!isSpeaker(speaker) || typeof text !== 'string') {
    Logger.warn(`[DialogueDatabase] ${where}: invalid speaker or text`);
    return null;
  }
  return { speaker, text };
}

/** Lookup of scripted sequences by id. */
export class DialogueDatabase {
  private readonly sequences = new Map<string, DialogueSequence>();

  constructor(sequences: readonly DialogueSequence[] = []) {
    for (const s of sequences) this.add(s);
  }

  /**
   * Build from parsed JSON (`{ sequences: [{ id, lines: [{ speaker, text }] }] }`).
   * Malformed entries are logged and skipped.
   */
  static fromData(data: unknown): DialogueDatabase {
    const db = new DialogueDatabase();
    if (!isRecord(data) || !Array.isArray(data.sequences)) {
      Logger.error('[DialogueDatabase] expected { sequences: [...] }');
      return db;
    }
    data.sequences.forEach((raw: unknown, i: number) => {
      if (!isRecord(raw) || typeof raw.id !== 'string' || !Array.isArray(raw.lines)) {
        Logger.warn(`[DialogueDatabase] sequence #${i} skipped: needs id and lines`);
        return;
      }
      const id = raw.id;
      const lines: DialogueLine[] = [];
      raw.lines.forEach((l: unknown, j: number) => {
        const line = parseLine(l, `${id}[${j}]`);
        if (line) lines.push(line);
      });
      db.add({ id, lines });
    });
    return db;
  }

  add(sequence: DialogueSequence): void {
    if (this.sequences.has(sequence.id)) Logger.warn(`[DialogueDatabase] duplicate sequence '${sequence.id}' replaced`);
    this.sequences.set(sequence.id, { id: sequence.id, lines: sequence.lines.map(l => ({ ...l })) });
  }

  getSequence(id: string): DialogueSequence | null {
    const found = this.sequences.get(id);
    if (!found) {
      Logger.warn(`[DialogueDatabase] sequence '${id}' not found`);
      return null;
    }
    return found;
  }

  get size(): number {
    return this.sequences.size;
  }
}

/**
 * Seconds a sequence takes to type out and auto-advance:
 * Σ(len(text) × typingSpeed + autoAdvanceDelay), plus a small pad.
 */
export function estimateDialogueDuration(sequence: DialogueSequence, timing: DialogueTiming = DIALOGUE_TIMING): number {
  if (sequence.lines.length === 0) return 0;
  const typing = timing.typingSpeed > 0 ? timing.typingSpeed : FALLBACK_TYPING_SPEED;
  let total = 0;
  for (const line of sequence.lines) total += line.text.length * typing + timing.autoAdvanceDelay;
  return total + ESTIMATE_PADDING_SEC;
}
