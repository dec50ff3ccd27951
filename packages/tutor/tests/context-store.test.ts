import { describe, it, expect, beforeEach } from 'vitest';
import { ContextStore, HISTORY_LIMIT } from '../src/services/context-store.js';
import { createFileAnalysis } from '../src/services/file-analysis.js';

const FIXED_NOW = new Date('2024-03-01T09:30:00Z');

function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release: () => release() };
}

describe('ContextStore', () => {
  let store: ContextStore;
  let nextId: number;

  beforeEach(() => {
    nextId = 0;
    store = new ContextStore({
      now: () => FIXED_NOW,
      generateId: () => `turn-${++nextId}`,
    });
  });

  describe('profiles', () => {
    it('creates a default profile on first contact', () => {
      const profile = store.getOrCreate('u1');

      expect(profile).toEqual({
        userId: 'u1',
        level: 'beginner',
        targetLanguage: 'English',
        lastTopic: null,
        history: [],
        learningGoals: [],
        weakAreas: [],
        strengths: [],
        fileMemory: [],
        currentFile: null,
        firstSeenAt: FIXED_NOW,
      });
    });

    it('returns the same profile object on later calls', () => {
      expect(store.getOrCreate('u1')).toBe(store.getOrCreate('u1'));
    });

    it('treats a user as new until a turn is recorded', () => {
      expect(store.isNewUser('u1')).toBe(true);
      store.getOrCreate('u1');
      expect(store.isNewUser('u1')).toBe(true);

      store.recordTurn('u1', 'hello', 'Dara');
      expect(store.isNewUser('u1')).toBe(false);
    });
  });

  describe('history', () => {
    it('keeps at most HISTORY_LIMIT turns, dropping the oldest', () => {
      for (let i = 0; i < HISTORY_LIMIT + 2; i++) {
        store.recordTurn('u1', `q${i}`, 'Dara');
      }

      const history = store.getHistory('u1');
      expect(history).toHaveLength(15);
      expect(history[0].question).toBe('q2');
      expect(history[14].question).toBe('q16');
    });

    it('returns a handle that identifies the recorded turn', () => {
      const handle = store.recordTurn('u1', 'What is a verb?', 'Dara');

      expect(handle).toEqual({ userId: 'u1', turnId: 'turn-1' });
      expect(store.getHistory('u1')[0]).toMatchObject({
        id: 'turn-1',
        question: 'What is a verb?',
        username: 'Dara',
        timestamp: FIXED_NOW,
      });
    });

    it('attaches a response to the turn named by the handle, not the last turn', () => {
      const first = store.recordTurn('u1', 'first', 'Dara');
      store.recordTurn('u1', 'second', 'Dara');

      expect(store.recordResponse(first, 'answer one')).toBe(true);

      const [one, two] = store.getHistory('u1');
      expect(one.response).toBe('answer one');
      expect(two.response).toBeUndefined();
    });

    it('ignores a response whose turn has been evicted', () => {
      const small = new ContextStore({ historyLimit: 2 });
      const evicted = small.recordTurn('u1', 'a', 'Dara');
      small.recordTurn('u1', 'b', 'Dara');
      const latest = small.recordTurn('u1', 'c', 'Dara');

      expect(small.recordResponse(evicted, 'late')).toBe(false);
      expect(small.recordResponse(latest, 'on time')).toBe(true);
      expect(small.getHistory('u1').map((t) => t.response)).toEqual([undefined, 'on time']);
    });

    it('lists turns still waiting for a response', () => {
      const answered = store.recordTurn('u1', 'a', 'Dara');
      store.recordTurn('u1', 'b', 'Dara');
      store.recordResponse(answered, 'done');

      expect(store.getUnansweredTurns('u1').map((t) => t.question)).toEqual(['b']);
    });

    it('sets the last topic to the first 50 characters of the latest message', () => {
      store.recordTurn('u1', 'x'.repeat(60), 'Dara');
      expect(store.getOrCreate('u1').lastTopic).toBe('x'.repeat(50));

      store.recordTurn('u1', 'short topic', 'Dara');
      expect(store.getOrCreate('u1').lastTopic).toBe('short topic');
    });

    it('returns an empty history for unknown users', () => {
      expect(store.getHistory('nobody')).toEqual([]);
    });
  });

  describe('updateProfileHeuristics', () => {
    it('detects level and target language keywords', () => {
      store.updateProfileHeuristics('u1', 'I am an Intermediate student learning Khmer');

      const profile = store.getOrCreate('u1');
      expect(profile.level).toBe('intermediate');
      expect(profile.targetLanguage).toBe('Khmer');
    });

    it('takes the first matching rule when several keywords appear', () => {
      store.updateProfileHeuristics('u1', 'I speak French and English, advanced but a beginner');

      const profile = store.getOrCreate('u1');
      expect(profile.level).toBe('beginner');
      expect(profile.targetLanguage).toBe('French');
    });

    it('prefers Khmer over French when both are mentioned', () => {
      store.updateProfileHeuristics('u1', 'khmer or french?');
      expect(store.getOrCreate('u1').targetLanguage).toBe('Khmer');

      store.updateProfileHeuristics('u2', 'French first, then Cambodian');
      expect(store.getOrCreate('u2').targetLanguage).toBe('Khmer');
    });

    it('leaves the profile alone when no keyword matches', () => {
      store.updateProfileHeuristics('u1', 'advanced french please');
      store.updateProfileHeuristics('u1', 'what does this mean?');

      const profile = store.getOrCreate('u1');
      expect(profile.level).toBe('advanced');
      expect(profile.targetLanguage).toBe('French');
    });
  });

  describe('recordLearningSignal', () => {
    it('tags known learning topics found in the message', () => {
      store.recordLearningSignal('u1', 'I want to learn grammar and vocabulary');

      const profile = store.getOrCreate('u1');
      expect(profile.learningGoals).toEqual(['grammar', 'vocabulary']);
      expect(profile.weakAreas).toEqual([]);
      expect(profile.strengths).toEqual([]);
    });

    it('falls back to the words after the trigger phrase', () => {
      store.recordLearningSignal('u1', 'I struggle with the past simple!');

      expect(store.getOrCreate('u1').weakAreas).toEqual(['with the past simple']);
    });

    it('does not store the same tag twice', () => {
      store.recordLearningSignal('u1', 'I want to learn grammar');
      store.recordLearningSignal('u1', 'My goal is better grammar');

      expect(store.getOrCreate('u1').learningGoals).toEqual(['grammar']);
    });

    it('drops the oldest tag once the list is full', () => {
      const small = new ContextStore({ tagLimit: 2 });
      small.recordLearningSignal('u1', 'I want to learn grammar');
      small.recordLearningSignal('u1', 'I want to learn spelling');
      small.recordLearningSignal('u1', 'I want to learn writing');

      expect(small.getOrCreate('u1').learningGoals).toEqual(['spelling', 'writing']);
    });

    it('ignores messages without a trigger phrase', () => {
      store.recordLearningSignal('u1', 'grammar is fun');

      const profile = store.getOrCreate('u1');
      expect(profile.learningGoals).toEqual([]);
      expect(profile.weakAreas).toEqual([]);
      expect(profile.strengths).toEqual([]);
    });
  });

  describe('file memory', () => {
    const analysis = (n: number) =>
      createFileAnalysis(`f${n}.pdf`, 'pdf', '', `analysis ${n}`, FIXED_NOW);

    it('keeps at most 10 analyses and tracks the current file', () => {
      for (let i = 0; i < 12; i++) {
        store.recordFileAnalysis('u1', analysis(i));
      }

      const profile = store.getOrCreate('u1');
      expect(profile.fileMemory).toHaveLength(10);
      expect(profile.fileMemory[0].filename).toBe('f2.pdf');
      expect(profile.currentFile?.filename).toBe('f11.pdf');
    });

    it('returns the most recent analyses oldest first', () => {
      for (let i = 0; i < 5; i++) {
        store.recordFileAnalysis('u1', analysis(i));
      }

      expect(store.getRecentAnalyses('u1', 3).map((a) => a.filename)).toEqual([
        'f2.pdf',
        'f3.pdf',
        'f4.pdf',
      ]);
      expect(store.getRecentAnalyses('u1', 0)).toEqual([]);
      expect(store.getRecentAnalyses('nobody', 3)).toEqual([]);
    });
  });

  describe('runExclusive', () => {
    it('runs one user’s tasks in order without blocking other users', async () => {
      const order: string[] = [];
      const gate = deferred();

      const first = store.runExclusive('u1', async () => {
        order.push('a-start');
        await gate.promise;
        order.push('a-end');
      });
      const second = store.runExclusive('u1', async () => {
        order.push('b');
      });
      const other = store.runExclusive('u2', async () => {
        order.push('other');
      });

      await other;
      expect(order).toEqual(['a-start', 'other']);

      gate.release();
      await Promise.all([first, second]);
      expect(order).toEqual(['a-start', 'other', 'a-end', 'b']);
    });

    it('keeps the queue moving after a task fails', async () => {
      await expect(
        store.runExclusive('u1', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      await expect(store.runExclusive('u1', async () => 'ok')).resolves.toBe('ok');
    });
  });

  it('reports totals across users', () => {
    store.recordTurn('u1', 'a', 'Dara');
    store.recordTurn('u1', 'b', 'Dara');
    store.recordTurn('u2', 'c', 'Sok');
    store.recordFileAnalysis('u2', createFileAnalysis('notes.png', 'png', '', 'text'));

    expect(store.getStats()).toEqual({ activeUsers: 2, totalTurns: 3, totalFiles: 1 });
  });
});
