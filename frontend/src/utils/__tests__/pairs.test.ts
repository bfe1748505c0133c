import { describe, expect, it } from 'vitest';
import { parseNamedPairs, splitKeywords } from '../pairs';

describe('parseNamedPairs', () => {
  it('reads name=value entries and drops incomplete ones', () => {
    expect(parseNamedPairs('Fashion=50000000, Food = 50000006\nbroken\n=1\nEmpty=')).toEqual([
      { name: 'Fashion', value: '50000000' },
      { name: 'Food', value: '50000006' }
    ]);
  });

  it('keeps everything after the first equals sign as the value', () => {
    expect(parseNamedPairs('a=b=c')).toEqual([{ name: 'a', value: 'b=c' }]);
  });
});

describe('splitKeywords', () => {
  it('splits on commas and drops blanks', () => {
    expect(splitKeywords(' alpha, ,beta ,')).toEqual(['alpha', 'beta']);
  });
});
