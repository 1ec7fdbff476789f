import { readBool, readDate, readInt, readNumber, readPageFilter, readString } from '../../../src/common/http/query';
import { containsIgnoreCase, equalsIgnoreCase, escapeRegex, inRange } from '../../../src/common/persistence/query';

describe('Query string readers', () => {
  it('should read Page and ItemsPerPage', () => {
    expect(readPageFilter({ Page: '2', ItemsPerPage: '50' })).toEqual({ page: 2, itemsPerPage: 50 });
    expect(readPageFilter({})).toEqual({ page: undefined, itemsPerPage: undefined });
  });

  it('should take the first value of a repeated parameter', () => {
    expect(readString({ name: ['first', 'second'] }, 'name')).toBe('first');
  });

  it('should treat an empty value as absent', () => {
    expect(readString({ name: '' }, 'name')).toBeUndefined();
  });

  it('should parse numbers and ignore garbage', () => {
    expect(readNumber({ amount: '-12.5' }, 'amount')).toBe(-12.5);
    expect(readNumber({ amount: 'abc' }, 'amount')).toBeUndefined();
    expect(readInt({ page: '3.9' }, 'page')).toBe(3);
  });

  it('should parse booleans in either spelling', () => {
    expect(readBool({ flag: 'TRUE' }, 'flag')).toBe(true);
    expect(readBool({ flag: '0' }, 'flag')).toBe(false);
    expect(readBool({ flag: 'maybe' }, 'flag')).toBeUndefined();
  });

  it('should parse ISO dates', () => {
    expect(readDate({ from: '2024-03-01' }, 'from')).toEqual(new Date('2024-03-01T00:00:00.000Z'));
    expect(readDate({ from: 'not-a-date' }, 'from')).toBeUndefined();
  });
});

describe('Query condition builders', () => {
  it('should escape regular expression metacharacters', () => {
    expect(escapeRegex('a.b*(c)')).toBe('a\\.b\\*\\(c\\)');
  });

  it('should anchor case-insensitive equality', () => {
    expect(equalsIgnoreCase('RUB')).toEqual({ $regex: '^RUB$', $options: 'i' });
  });

  it('should not anchor substring matches', () => {
    expect(containsIgnoreCase('card+')).toEqual({ $regex: 'card\\+', $options: 'i' });
  });

  it('should build inclusive ranges from the bounds given', () => {
    expect(inRange(1, 5)).toEqual({ $gte: 1, $lte: 5 });
    expect(inRange(undefined, 5)).toEqual({ $lte: 5 });
    expect(inRange(1)).toEqual({ $gte: 1 });
    expect(inRange()).toBeUndefined();
  });
});
