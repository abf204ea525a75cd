import { canTransition, OPEN_STATUSES, sourcesOf } from './enrollment-status';

describe('enrollment status machine', () => {
  it('allows the forward transitions', () => {
    expect(canTransition('pending', 'active')).toBe(true);
    expect(canTransition('active', 'completed')).toBe(true);
    expect(canTransition('active', 'withdrawn')).toBe(true);
    expect(canTransition('pending', 'withdrawn')).toBe(true);
  });

  it('treats completed and withdrawn as terminal', () => {
    expect(canTransition('completed', 'active')).toBe(false);
    expect(canTransition('completed', 'withdrawn')).toBe(false);
    expect(canTransition('withdrawn', 'active')).toBe(false);
  });

  it('does not skip payment', () => {
    expect(canTransition('pending', 'completed')).toBe(false);
  });

  it('derives the update filter from the table', () => {
    expect(sourcesOf('active')).toEqual(['pending']);
    expect(sourcesOf('completed')).toEqual(['active']);
    expect(sourcesOf('withdrawn')).toEqual(['pending', 'active']);
    expect(sourcesOf('pending')).toEqual([]);
  });

  it('only pending and active are open', () => {
    expect(OPEN_STATUSES).toEqual(['pending', 'active']);
  });
});
