import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import {
  gyms,
  users,
  members,
  memberCodeCounters,
  membershipPlans,
  memberships,
  checkIns,
  payments,
} from '../schema';

const tenantTables = [users, members, membershipPlans, memberships, checkIns, payments];

describe('tenant partitioning', () => {
  it('gives every gym-owned table a non-null gym_id', () => {
    for (const table of tenantTables) {
      const config = getTableConfig(table);
      const gymId = config.columns.find((c) => c.name === 'gym_id');
      expect(gymId?.notNull, config.name).toBe(true);
    }
  });

  it('never cascades deletes', () => {
    for (const table of [...tenantTables, memberCodeCounters]) {
      const config = getTableConfig(table);
      expect(config.foreignKeys.length, config.name).toBeGreaterThan(0);
      for (const fk of config.foreignKeys) {
        expect(fk.onDelete, `${config.name}.${fk.getName()}`).toBe('restrict');
      }
    }
  });

  it('references members through (gym_id, member_id) pairs', () => {
    for (const table of [memberships, checkIns, payments]) {
      const config = getTableConfig(table);
      const memberFk = config.foreignKeys.find((fk) =>
        fk.reference().foreignTable === members,
      );
      expect(memberFk, config.name).toBeDefined();
      expect(memberFk?.reference().columns.map((c) => c.name)).toEqual(['gym_id', 'member_id']);
    }
  });
});

describe('tombstones', () => {
  it('adds deleted_at to every entity', () => {
    for (const table of [gyms, ...tenantTables]) {
      const config = getTableConfig(table);
      const deletedAt = config.columns.find((c) => c.name === 'deleted_at');
      expect(deletedAt, config.name).toBeDefined();
      expect(deletedAt?.notNull).toBe(false);
    }
  });

  it('scopes member phone and email uniqueness to live rows', () => {
    const config = getTableConfig(members);
    const byName = new Map(config.indexes.map((i) => [i.config.name, i.config]));
    expect(byName.get('uq_members_gym_phone_live')?.unique).toBe(true);
    expect(byName.get('uq_members_gym_phone_live')?.where).toBeDefined();
    expect(byName.get('uq_members_gym_email_live')?.unique).toBe(true);
    expect(byName.get('uq_members_gym_email_live')?.where).toBeDefined();
  });
});

describe('check constraints', () => {
  it('restricts payment enums and amount', () => {
    const names = getTableConfig(payments).checks.map((c) => c.name).sort();
    expect(names).toEqual([
      'chk_amount',
      'chk_payment_for',
      'chk_payment_method',
      'chk_payment_status',
    ]);
  });

  it('restricts membership status and plan duration', () => {
    expect(getTableConfig(memberships).checks.map((c) => c.name)).toContain('chk_memberships_status');
    expect(getTableConfig(membershipPlans).checks.map((c) => c.name)).toContain(
      'chk_membership_plans_duration',
    );
  });
});
