import { toSkipTake } from '../../../src/common/pagination';

describe('toSkipTake', () => {
  it('should default to the first page of 10', () => {
    expect(toSkipTake({})).toEqual({ skip: 0, take: 10 });
  });

  it('should skip whole pages before the requested one', () => {
    expect(toSkipTake({ page: 3, itemsPerPage: 25 })).toEqual({ skip: 50, take: 25 });
  });

  it('should clamp the page size to 1000', () => {
    expect(toSkipTake({ page: 2, itemsPerPage: 5000 })).toEqual({ skip: 1000, take: 1000 });
  });

  it('should treat pages below 1 as the first page', () => {
    expect(toSkipTake({ page: 0, itemsPerPage: 20 })).toEqual({ skip: 0, take: 20 });
    expect(toSkipTake({ page: -4 })).toEqual({ skip: 0, take: 10 });
  });

  it('should raise a page size below 1 to 1', () => {
    expect(toSkipTake({ page: 4, itemsPerPage: 0 })).toEqual({ skip: 3, take: 1 });
  });
});
