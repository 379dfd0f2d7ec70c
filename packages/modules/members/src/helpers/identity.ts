export interface PhoneHolder {
  id: string;
  deletedAt: Date | null;
}

export type PhoneMatch =
  | { kind: 'none' }
  | { kind: 'live_conflict'; memberId: string }
  | { kind: 'restorable'; memberId: string };

/**
 * Classify the members of one gym holding a phone number. A live holder
 * always wins; otherwise the most recently deleted holder is offered for
 * restore, whichever staff member created it.
 */
export function classifyPhoneMatches(holders: readonly PhoneHolder[]): PhoneMatch {
  const live = holders.find((h) => h.deletedAt === null);
  if (live) return { kind: 'live_conflict', memberId: live.id };

  let latest: PhoneHolder | undefined;
  for (const holder of holders) {
    if (!latest || (holder.deletedAt?.getTime() ?? 0) > (latest.deletedAt?.getTime() ?? 0)) {
      latest = holder;
    }
  }
  return latest ? { kind: 'restorable', memberId: latest.id } : { kind: 'none' };
}
