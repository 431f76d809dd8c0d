import { describe, it, expect } from 'vitest';
import { DialogueDatabase, estimateDialogueDuration } from '../src/game/DialogueDatabase';
import dialogueData from '../src/data/dialogue.json';

describe('estimateDialogueDuration', () => {
  it('sums typing time and auto-advance per line plus padding', () => {
    const seq = { id: 's', lines: [{ speaker: 'Player' as const, text: 'hello' }, { speaker: 'Boss_Full' as const, text: 'hi there' }] };
    expect(estimateDialogueDuration(seq, { typingSpeed: 0.04, autoAdvanceDelay: 0.5 })).toBeCloseTo(1.72, 10);
  });

  it('is zero for an empty sequence', () => {
    expect(estimateDialogueDuration({ id: 'empty', lines: [] })).toBe(0);
  });

  it('falls back to a default typing speed when none is set', () => {
    const seq = { id: 's', lines: [{ speaker: 'Player' as const, text: 'abcd' }] };
    expect(estimateDialogueDuration(seq, { typingSpeed: 0, autoAdvanceDelay: 0.5 })).toBeCloseTo(0.9, 10);
  });
});

describe('DialogueDatabase', () => {
  it('loads the bundled encounter script', () => {
    const db = DialogueDatabase.fromData(dialogueData);
    expect(db.size).toBe(2);
    const intro = db.getSequence('BossIntro');
    expect(intro?.lines).toHaveLength(4);
    expect(intro?.lines[0].speaker).toBe('Boss_Anonymous');
    expect(db.getSequence('BossPhaseChange')?.lines[1].text).toBe('Then stop hiding behind it.');
  });

  it('skips malformed entries', () => {
    const db = DialogueDatabase.fromData({
      sequences: [
        { id: 'x', lines: [{ speaker: 'Nobody', text: 'a' }, { speaker: 'Player', text: 'ok' }] },
        { lines: [] },
        'nonsense',
      ],
    });
    expect(db.size).toBe(1);
    expect(db.getSequence('x')?.lines).toEqual([{ speaker: 'Player', text: 'ok' }]);
  });

  it('returns null for unknown ids and non-object data', () => {
    expect(new DialogueDatabase().getSequence('missing')).toBeNull();
    expect(DialogueDatabase.fromData(42).size).toBe(0);
  });
});
