import { monotonicFactory } from 'ulid';

// List queries page by `id < cursor` in descending order, so ids minted in the
// same millisecond must still sort in creation order.
const nextUlid = monotonicFactory();

export function generateUlid(): string {
  return nextUlid();
}
