export {
  type CredentialClaims,
  type CredentialKeys,
  type IssueCredentialInput,
  type RoleResolution,
  issueCredential,
  resolveRole,
  toPrincipal,
  verifyCredential,
} from './credentials.js';

export {
  type RevocationList,
  InMemoryRevocationList,
  REVOCATION_PREFIX,
  createRedisRevocationList,
} from './revocation.js';
