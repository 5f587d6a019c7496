export { runRecents, type RecentsDependencies } from './runRecents.js';
export {
  collectRawChanges,
  loadMembershipSets,
  type CollectedChanges,
  type RetrievalFailure,
} from './collect.js';
