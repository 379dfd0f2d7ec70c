/**
 * Demo data for a local database: one gym, its owner, and a monthly plan.
 *
 *   npm run db:seed
 */
import dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config();

const { closeDb, withTenant, membershipPlans } = await import('@gymledger/db');
const { onboardGym } = await import('./tenants/commands/onboard-gym');
const { logger, serializeError } = await import('./observability/logger');

async function seed(): Promise<void> {
  const { gym, owner } = await onboardGym({
    gym: {
      name: 'Demo Fitness Center',
      address: 'Jl. Contoh No. 1, Jakarta',
      phone: '+6281234500000',
    },
    owner: {
      name: 'Demo Owner',
      email: 'owner@demo-gym.test',
      password: 'change-me-please',
      phone: '+6281234500001',
    },
  });

  await withTenant(gym.id, async (tx) => {
    await tx.insert(membershipPlans).values({
      gymId: gym.id,
      name: 'Monthly',
      durationDays: 30,
      price: '250000.00',
      description: 'Unlimited gym access for 30 days',
    });
  });

  logger.info('Seed complete', { tenantId: gym.id, userId: owner.id });
}

try {
  await seed();
} catch (err) {
  logger.error('Seed failed', { error: serializeError(err) });
  process.exitCode = 1;
} finally {
  await closeDb();
}
