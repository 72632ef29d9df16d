import type { ProcessedMessage } from '../types';
import { InvalidLimitError } from '../utils/errors';
import { assertValidLimit, rankMessages } from './reaction.ranker';

function processed(id: number, totalReactions: number): ProcessedMessage {
  return {
    id,
    totalReactions,
    localDate: new Date(Date.UTC(2023, 0, 1)),
    text: '',
  };
}

describe('rankMessages', () => {
  const messages = [processed(1, 4), processed(2, 10), processed(3, 4), processed(4, 7), processed(5, 10)];

  it('should order by total reactions, most first', () => {
    expect(rankMessages(messages, 10).map((m) => m.totalReactions)).toEqual([10, 10, 7, 4, 4]);
  });

  it('should keep input order between equal totals', () => {
    expect(rankMessages(messages, 10).map((m) => m.id)).toEqual([2, 5, 4, 1, 3]);
  });

  it('should keep input order even when ids run backwards', () => {
    const reversed = [processed(30, 5), processed(20, 5), processed(10, 5)];
    expect(rankMessages(reversed, 3).map((m) => m.id)).toEqual([30, 20, 10]);
  });

  it('should truncate to the limit', () => {
    expect(rankMessages(messages, 2).map((m) => m.id)).toEqual([2, 5]);
  });

  it('should return nothing for a limit of 0', () => {
    expect(rankMessages(messages, 0)).toEqual([]);
  });

  it('should return everything when the limit exceeds the count', () => {
    expect(rankMessages(messages, 100)).toHaveLength(5);
  });

  it('should not reorder its input', () => {
    rankMessages(messages, 5);
    expect(messages.map((m) => m.id)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should accept a limit beyond the safe integer range', () => {
    expect(rankMessages(messages, 1e17)).toHaveLength(5);
  });

  it('should reject a negative limit', () => {
    expect(() => rankMessages(messages, -1)).toThrow(InvalidLimitError);
  });
});

describe('assertValidLimit', () => {
  it.each([0, 1, 5, 1000, 1e17])('should accept %p', (limit) => {
    expect(() => assertValidLimit(limit)).not.toThrow();
  });

  it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])('should reject %p', (limit) => {
    expect(() => assertValidLimit(limit)).toThrow(InvalidLimitError);
  });
});
