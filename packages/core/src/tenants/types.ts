import type { gyms } from '@gymledger/db';

export type Gym = typeof gyms.$inferSelect;
