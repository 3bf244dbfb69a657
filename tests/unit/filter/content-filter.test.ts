import { describe, it, expect } from 'vitest';
import {
  buildSearchableText,
  compileFilter,
  evaluateItem,
} from '../../../src/filter/content-filter.js';
import { createTopicMatcher } from '../../../src/filter/topic-matcher.js';
import { createTopic } from '../../../src/types/topic.js';
import type { ContentItem, PreferenceSet } from '../../../src/types/preferences.js';
import { createItem, createMockLogger } from '../../helpers/factories.js';

function prefs(preferred: string[], blocked: string[]): PreferenceSet {
  return {
    preferred: new Set(preferred.map(createTopic)),
    blocked: new Set(blocked.map(createTopic)),
  };
}

describe('buildSearchableText', () => {
  it('joins title, description and tags in canonical form', () => {
    const item = createItem('1', '  Jazz  Night ', {
      description: 'Live\nfrom the CLUB',
      tags: ['Piano', 'Trio'],
    });

    expect(buildSearchableText(item)).toBe('jazz night live from the club piano trio');
  });
});

describe('word-boundary matching', () => {
  const matches = (topic: string, text: string): boolean =>
    createTopicMatcher(createTopic(topic))(text);

  it('matches whole words only', () => {
    expect(matches('asmr', 'asmr eating show')).toBe(true);
    expect(matches('asmr', 'asmrookie unboxing')).toBe(false);
    expect(matches('asmr', 'best of #asmr')).toBe(true);
    expect(matches('asmr', "asmr's finest")).toBe(true);
  });

  it('matches phrases joined by spaces or hyphens', () => {
    expect(matches('family vlog', 'our family vlog day')).toBe(true);
    expect(matches('family vlog', 'our family-vlog day')).toBe(true);
    expect(matches('family vlog', 'our familyvlog day')).toBe(false);
    expect(matches('stand-up', 'new stand up special')).toBe(true);
  });

  it('handles topics with regex characters', () => {
    expect(matches('c++', 'learn c++ fast')).toBe(true);
    expect(matches('c++', 'learn c+ fast')).toBe(false);
  });

  it('treats non-latin letters as word characters', () => {
    expect(matches('аниме', 'лучшее аниме года')).toBe(true);
    expect(matches('аниме', 'анимешник смотрит')).toBe(false);
  });

  it('falls back to plain substring checks in substring mode', () => {
    expect(createTopicMatcher(createTopic('asmr'), 'substring')('asmrookie unboxing')).toBe(true);
  });
});

describe('evaluateItem', () => {
  it('hides an item containing a blocked topic', () => {
    const decision = evaluateItem(createItem('1', 'ASMR eating show'), prefs([], ['asmr']));

    expect(decision.visible).toBe(false);
    expect(decision.blockedBy).toBe('asmr');
    expect(decision.relevanceDelta).toBe(0);
  });

  it('does not hide on a mid-word occurrence', () => {
    const decision = evaluateItem(createItem('1', 'asmrookie unboxing'), prefs([], ['asmr']));

    expect(decision.visible).toBe(true);
    expect(decision.relevanceDelta).toBe(0);
    expect(decision.blockedBy).toBeNull();
  });

  it('hides on a naive substring in substring mode', () => {
    const decision = evaluateItem(createItem('1', 'asmrookie unboxing'), prefs([], ['asmr']), {
      matchMode: 'substring',
    });

    expect(decision.visible).toBe(false);
  });

  it('lets exclusion win over preference matches', () => {
    const decision = evaluateItem(
      createItem('1', 'Minecraft drama explained'),
      prefs(['minecraft'], ['drama'])
    );

    expect(decision).toMatchObject({
      visible: false,
      relevanceDelta: 0,
      blockedBy: 'drama',
      matchedPreferred: [],
    });
  });

  it('searches description and tags too', () => {
    const item = createItem('1', 'Relaxing evening', { tags: ['ASMR'] });
    expect(evaluateItem(item, prefs([], ['asmr'])).visible).toBe(false);

    const described = createItem('2', 'Evening', { description: 'a calm jazz set' });
    expect(evaluateItem(described, prefs(['jazz'], [])).relevanceDelta).toBe(1);
  });

  it('boosts by the number of distinct preferred topics', () => {
    const item = createItem('1', 'Jazz piano jazz night', { tags: ['jazz'] });
    const decision = evaluateItem(item, prefs(['space', 'piano', 'jazz'], []));

    expect(decision.visible).toBe(true);
    expect(decision.matchedPreferred).toEqual(['jazz', 'piano']);
    expect(decision.relevanceDelta).toBe(2);
  });

  it('counts spellings of the same phrase once', () => {
    const item = createItem('1', 'Our family-vlog weekend');
    const decision = evaluateItem(item, prefs(['family-vlog', 'family vlog'], []));

    expect(decision.matchedPreferred).toEqual(['family vlog']);
    expect(decision.relevanceDelta).toBe(1);
  });

  it('counts both spellings separately in substring mode', () => {
    const item = createItem('1', 'family vlog and family-vlog');
    const decision = evaluateItem(item, prefs(['family-vlog', 'family vlog'], []), {
      matchMode: 'substring',
    });

    expect(decision.relevanceDelta).toBe(2);
  });

  it('scales the boost by boostUnit', () => {
    const item = createItem('1', 'Jazz piano night');
    expect(evaluateItem(item, prefs(['jazz', 'piano'], []), { boostUnit: 5 }).relevanceDelta).toBe(
      10
    );
  });

  it('keeps everything visible with zero delta when no preferences are set', () => {
    const decision = evaluateItem(createItem('1', 'Anything at all'), prefs([], []));

    expect(decision).toEqual({
      item: createItem('1', 'Anything at all'),
      visible: true,
      relevanceDelta: 0,
      blockedBy: null,
      matchedPreferred: [],
      degraded: false,
    });
  });

  it('reports the first blocked topic in sorted order regardless of insertion order', () => {
    const item = createItem('1', 'zebra and apple');

    expect(evaluateItem(item, prefs([], ['zebra', 'apple'])).blockedBy).toBe('apple');
    expect(evaluateItem(item, prefs([], ['apple', 'zebra'])).blockedBy).toBe('apple');
  });

  it('is deterministic', () => {
    const item = createItem('1', 'Space jazz documentary');
    const set = prefs(['jazz', 'space'], ['drama']);

    expect(evaluateItem(item, set)).toEqual(evaluateItem(item, set));
  });

  it('degrades to visible with zero delta when an item cannot be evaluated', () => {
    const logger = createMockLogger();
    const broken = JSON.parse('{"id":"bad","title":"asmr","tags":42}') as ContentItem;

    const decision = evaluateItem(broken, prefs(['asmr'], ['drama']), { logger });

    expect(decision.visible).toBe(true);
    expect(decision.relevanceDelta).toBe(0);
    expect(decision.degraded).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('compileFilter', () => {
  it('reuses one compiled set across items', () => {
    const evaluate = compileFilter(prefs(['chess'], ['prank']));

    expect(evaluate(createItem('1', 'Chess openings')).relevanceDelta).toBe(1);
    expect(evaluate(createItem('2', 'Prank gone wrong')).visible).toBe(false);
    expect(evaluate(createItem('3', 'Cooking pasta')).relevanceDelta).toBe(0);
  });
});
