export { createAccount, validateNewMasterSecret, type Account, type VaultRecord } from "@/lib/account";
export { AccountStore, parseAccounts, serializeAccounts, type AccountStoreOptions } from "@/lib/account-store";
export { createAlphabet, loadAlphabet, DEFAULT_ALPHABET, type Alphabet } from "@/lib/alphabet";
export {
  addCustomCategory,
  availableCategories,
  builtinCategories,
  isKnownCategory,
  requireCategory,
  type CategoryChoice,
} from "@/lib/categories";
export { charLength, SubstitutionCipher, transform } from "@/lib/cipher";
export {
  generatorDefaults,
  getStorageConfig,
  MAX_LOGIN_ATTEMPTS,
  MIN_MASTER_SECRET_LENGTH,
  type StorageConfig,
} from "@/lib/config";
export { isVaultError, VaultError, type VaultErrorKind } from "@/lib/errors";
export { attemptsLeftMessage, LoginAttempts, type LoginAttemptResult } from "@/lib/login";
export {
  generatePassword,
  generatorCharset,
  normalizeGeneratorOptions,
  type GeneratorOptions,
  type PasswordGenerator,
} from "@/lib/password-generator";
export {
  listAll,
  listByCategory,
  search,
  type RecordView,
  type SearchMatch,
  type SearchResult,
} from "@/lib/queries";
export {
  addRecord,
  assertNewResource,
  decryptRecord,
  deleteRecord,
  getRecord,
  updateRecord,
  type DeleteOutcome,
} from "@/lib/records";
export { VaultSession, type SessionOptions } from "@/lib/session";
export { FileTextStorage, MemoryTextStorage, type TextStorage } from "@/lib/text-storage";
