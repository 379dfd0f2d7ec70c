export const MEMBER_EVENTS = {
  CREATED: 'members.member.created.v1',
  UPDATED: 'members.member.updated.v1',
  DELETED: 'members.member.deleted.v1',
  RESTORED: 'members.member.restored.v1',
} as const;
