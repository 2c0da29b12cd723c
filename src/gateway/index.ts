export {
  DocumentGateway,
  DEFAULT_STAGING_DIR,
  DEFAULT_PURGE_GRACE_MS,
  type DocumentGatewayOptions,
} from './document-gateway.js';
export { localDocumentHandle, type DocumentHandle } from './document-handle.js';
export { secureDelete } from './secure-delete.js';
export {
  noStorageProtection,
  ownerOnlyStorageProtection,
  defaultStorageProtection,
  type StorageProtection,
} from './storage-protection.js';
