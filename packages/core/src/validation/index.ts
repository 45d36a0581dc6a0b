export { formatAjvErrors, validateDetailed, assertValid } from './common';
export type { ValidationResult } from './common';
export { validateTargetDetailed, isTarget, loadTarget, loadTargetMeta } from './target_validator';
export {
  encodeChangeContent,
  emptyChangeContent,
  decodeTargetMeta,
  decodeDelegationEdit,
  decodeRoleKeyEdit,
} from './change_content_validator';
export { validateTrustConfigDetailed, loadTrustConfig } from './config_validator';
