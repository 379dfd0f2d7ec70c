export const MODULE_KEY = 'members' as const;
export const MODULE_NAME = 'Member Registry';
export const MODULE_VERSION = '0.1.0';

export { createMember } from './commands/create-member';
export { updateMember } from './commands/update-member';
export { softDeleteMember } from './commands/soft-delete-member';
export { restoreMember } from './commands/restore-member';

export { getMember } from './queries/get-member';
export { listMembers } from './queries/list-members';
export type { ListMembersResult } from './queries/list-members';
export { findOrOfferRestore } from './queries/find-or-offer-restore';

export { formatMemberCode, assignMemberCode } from './helpers/member-code';
export { classifyPhoneMatches } from './helpers/identity';
export type { PhoneHolder, PhoneMatch } from './helpers/identity';
export { collectDeletionBlockers } from './helpers/deletion-guard';

export { MEMBER_EVENTS } from './events';
export type { Member, RestoreOffer } from './types';
export {
  createMemberSchema,
  updateMemberSchema,
  listMembersSchema,
  findOrOfferRestoreSchema,
} from './validation';
export type { CreateMemberInput, UpdateMemberInput, ListMembersInput } from './validation';
