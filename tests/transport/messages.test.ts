import { describe, it, expect } from 'vitest';
import { normalizePull, parseInboundMessage } from '../../src/transport/messages';

function frame(value: unknown): string {
  return JSON.stringify(value);
}

describe('parseInboundMessage', () => {
  it('reports empty, non-text and non-JSON frames as malformed', () => {
    expect(parseInboundMessage('')).toEqual({ type: 'malformed', reason: 'empty or non-text frame' });
    expect(parseInboundMessage(null)).toEqual({ type: 'malformed', reason: 'empty or non-text frame' });
    expect(parseInboundMessage('{not json').type).toBe('malformed');
    expect(parseInboundMessage('[1,2]')).toEqual({ type: 'malformed', reason: 'frame is not a JSON object' });
  });

  it('passes clear, ping and unknown types through', () => {
    expect(parseInboundMessage(frame({ type: 'clear' }))).toEqual({ type: 'clear' });
    expect(parseInboundMessage(frame({ type: 'ping', ts: 42 }))).toEqual({ type: 'ping', ts: 42 });
    expect(parseInboundMessage(frame({ type: 'stats' }))).toEqual({ type: 'unknown', rawType: 'stats' });
  });

  it('reads pulls and metadata from the payload envelope', () => {
    const message = parseInboundMessage(
      frame({
        type: 'gacha_pulls',
        payload: {
          userId: 'user-1',
          displayName: 'Tester',
          totalPulls: 10,
          setName: 'ember_wilds',
          pulls: [{ name: 'fire_imp', rarity: 'R', level: 2, image_path: 'cards\\fire_imp.png' }],
        },
      }),
    );
    expect(message).toEqual({
      type: 'gacha_pulls',
      pulls: [{ name: 'fire_imp', rarity: 'R', isShiny: false, level: 2, imageRef: 'cards/fire_imp.png' }],
      meta: { totalPulls: 10, displayName: 'Tester', userId: 'user-1', setName: 'Ember Wilds' },
    });
  });

  it('falls back through the alias lists in order', () => {
    const message = parseInboundMessage(
      frame({
        type: 'gacha_pulls',
        set: 'outer_set',
        data: {
          display_name: '  ',
          user: { id: 'user-9', display_name: 'Nested Name' },
          total_pulls: '3',
          pulls: [{ name: 'a' }],
        },
      }),
    );
    if (message.type !== 'gacha_pulls') throw new Error(`unexpected ${message.type}`);
    expect(message.meta).toEqual({ totalPulls: 3, displayName: 'Nested Name', userId: 'user-9', setName: 'Outer Set' });
  });

  it('uses a plain string user as the display name', () => {
    const message = parseInboundMessage(frame({ type: 'gacha_pulls', payload: { user: 'viewer', pulls: [] } }));
    if (message.type !== 'gacha_pulls') throw new Error(`unexpected ${message.type}`);
    expect(message.meta.displayName).toBe('viewer');
  });

  it('drops non-object pulls and counts the rest when no total is given', () => {
    const message = parseInboundMessage(
      frame({ type: 'gacha_pulls', pulls: [{ name: 'a' }, 'junk', null, 7, { name: 'b' }], payload: { totalPulls: 0 } }),
    );
    if (message.type !== 'gacha_pulls') throw new Error(`unexpected ${message.type}`);
    expect(message.pulls.map((p) => p.name)).toEqual(['a', 'b']);
    expect(message.meta.totalPulls).toBe(2);
  });
});

describe('normalizePull', () => {
  it('defaults missing fields', () => {
    expect(normalizePull({})).toEqual({ name: '', rarity: '', isShiny: false, level: 0, imageRef: '' });
  });

  it('prefers is_shiny over isShiny and truncates the level', () => {
    const record = normalizePull({ is_shiny: false, isShiny: true, level: '4.7' });
    expect(record.isShiny).toBe(false);
    expect(record.level).toBe(4);
    expect(normalizePull({ isShiny: 1, level: -3 })).toMatchObject({ isShiny: true, level: 0 });
  });

  it('builds a relative image path from set, rarity and file', () => {
    expect(normalizePull({ image: 'imp.png', set: 'ember', rarity: 'SR' }).imageRef).toBe('../ember/sr/imp.png');
    expect(normalizePull({ image: 'imp.png' }).imageRef).toBe('../default/common/imp.png');
  });

  it('keeps a finite revealTime only', () => {
    expect(normalizePull({ revealTime: 900 }).revealTime).toBe(900);
    expect('revealTime' in normalizePull({ revealTime: '900' })).toBe(false);
  });
});
