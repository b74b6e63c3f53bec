import { DEFAULT_PAGE_SIZE, MAX_PAGE, pageWindow } from './pagination';

describe('pageWindow', () => {
  it('turns a 1-based page into limit and offset', () => {
    expect(pageWindow({ page: 1, perPage: 20 })).toEqual({ limit: 20, offset: 0 });
    expect(pageWindow({ page: 3, perPage: 20 })).toEqual({ limit: 20, offset: 40 });
  });

  it('keeps the offset of the last allowed page a plain safe integer', () => {
    const { offset } = pageWindow({ page: MAX_PAGE, perPage: DEFAULT_PAGE_SIZE });

    expect(offset).toBe(19999980);
    expect(Number.isSafeInteger(offset)).toBe(true);
    expect(String(offset)).toBe('19999980');
  });
});
