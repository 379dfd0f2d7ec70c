import { and, eq, isNull } from 'drizzle-orm';
import { withTenant, gyms } from '@gymledger/db';
import { NotFoundError } from '@gymledger/shared';
import type { Gym } from '../types';

export async function getTenant(tenantId: string): Promise<Gym> {
  return withTenant(tenantId, async (tx) => {
    const [gym] = await tx
      .select()
      .from(gyms)
      .where(and(eq(gyms.id, tenantId), isNull(gyms.deletedAt)))
      .limit(1);
    if (!gym) throw new NotFoundError('Gym', tenantId);
    return gym;
  });
}
