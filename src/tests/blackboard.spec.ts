import { describe, it, expect } from 'vitest';
import { INPUT_OWNER, createBlackboard, exists, keys, ownerOf, pick, read, write } from '../blackboard/index.js';
import { MissingDependency, StateConflict } from '../errors.js';

interface Notes {
  topic: string;
  outline: { points: string[] };
  draft: string;
  approved: boolean;
}

describe('blackboard', () => {
  it('seeds defined values under the input owner', () => {
    const bb = createBlackboard<Notes>({ topic: 'tides', draft: undefined });
    expect(keys(bb)).toEqual(['topic']);
    expect(read(bb, 'topic')).toBe('tides');
    expect(exists(bb, 'draft')).toBe(false);
    expect(ownerOf(bb, 'topic')).toBe(INPUT_OWNER);
  });

  it('returns a new blackboard on write and leaves the old one as it was', () => {
    const before = createBlackboard<Notes>({ topic: 'tides' });
    const after = write(before, 'outline', { points: ['moon'] }, 'outliner');
    expect(exists(before, 'outline')).toBe(false);
    expect(read(after, 'outline')).toEqual({ points: ['moon'] });
    expect(ownerOf(after, 'outline')).toBe('outliner');
    expect(keys(after)).toEqual(['topic', 'outline']);
  });

  it('deep-freezes stored values', () => {
    const outline = { points: ['moon', 'sun'] };
    const bb = write(createBlackboard<Notes>(), 'outline', outline, 'outliner');
    expect(Object.isFrozen(bb.values)).toBe(true);
    expect(Object.isFrozen(outline)).toBe(true);
    expect(Object.isFrozen(outline.points)).toBe(true);
    expect(() => outline.points.push('wind')).toThrow(TypeError);
  });

  it('freezes the children of a value that was only shallow-frozen', () => {
    const points = ['moon'];
    const outline = Object.freeze({ points });
    const bb = write(createBlackboard<Notes>(), 'outline', outline, 'outliner');
    expect(Object.isFrozen(points)).toBe(true);
    expect(() => read(bb, 'outline')?.points.push('wind')).toThrow(TypeError);
    expect(points).toEqual(['moon']);
  });

  it('refuses a second write to the same key', () => {
    const bb = write(createBlackboard<Notes>({ topic: 'tides' }), 'draft', 'v1', 'writer');
    expect(() => write(bb, 'draft', 'v2', 'editor')).toThrow(StateConflict);
    try {
      write(bb, 'topic', 'waves', 'writer');
    } catch (e) {
      expect(e).toBeInstanceOf(StateConflict);
      if (e instanceof StateConflict) {
        expect([e.key, e.owner, e.attemptedBy]).toEqual(['topic', INPUT_OWNER, 'writer']);
      }
    }
  });

  it('projects exactly the declared keys', () => {
    const bb = write(createBlackboard<Notes>({ topic: 'tides', approved: false }), 'draft', 'text', 'writer');
    const view = pick(bb, ['topic', 'approved'], 'reviewer');
    expect(view).toEqual({ topic: 'tides', approved: false });
    expect(Object.keys(view)).not.toContain('draft');
    expect(Object.isFrozen(view)).toBe(true);
  });

  it('names the step and the missing key', () => {
    const bb = createBlackboard<Notes>({ topic: 'tides' });
    expect(() => pick(bb, ['topic', 'outline'], 'writer')).toThrow(
      new MissingDependency('writer', 'outline').message
    );
  });
});
