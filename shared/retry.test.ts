import { calculateBackoff, clipToDeadline, nextBackoff } from './retry';

describe('retry helpers', () => {
  test('should double the delay per failure up to the cap', () => {
    expect(calculateBackoff(1, 1000, 8000)).toBe(1000);
    expect(calculateBackoff(2, 1000, 8000)).toBe(2000);
    expect(calculateBackoff(3, 1000, 8000)).toBe(4000);
    expect(calculateBackoff(5, 1000, 8000)).toBe(8000);
  });

  test('should treat zero failures like the first', () => {
    expect(calculateBackoff(0, 500, 8000)).toBe(500);
  });

  test('should step an in-flight back-off and clamp it', () => {
    expect(nextBackoff(2000, 60000)).toBe(4000);
    expect(nextBackoff(4000, 5000)).toBe(5000);
    expect(nextBackoff(5000, 5000)).toBe(5000);
  });

  test('should clip waits to the remaining time before a deadline', () => {
    expect(clipToDeadline(1000, 0, null)).toBe(1000);
    expect(clipToDeadline(1000, 2000, 2500)).toBe(500);
    expect(clipToDeadline(1000, 3000, 2500)).toBe(0);
    expect(clipToDeadline(200, 0, 2500)).toBe(200);
  });
});
