export type { ChangeKind } from "./change_detector";
export {
  classifyChange,
  isChanged,
  computeFingerprint,
  EMPTY_FINGERPRINT,
} from "./change_detector";
