export { AesGcmCipher, type FieldCipher, MIN_KEY_LENGTH } from "./cipher";
export {
  defineFields,
  type FieldAlgorithm,
  type FieldDefaults,
  type FieldDescriptor,
  type FieldSpec,
  type HashAlgorithm,
  hashed,
  plain,
  reversible,
  reversibleFields,
  STRENGTH_RANGES,
  UNSET_STRENGTH,
} from "./field-descriptor";
export {
  argon2Hasher,
  bcryptHasher,
  createDefaultHashers,
  type HasherRegistry,
  type PasswordHasher,
  scryptHasher,
  sha256Hasher,
  sha512Hasher,
} from "./hashers";
export {
  type DecryptionReport,
  EncryptionPipeline,
  type EncryptionPipelineOptions,
  type FieldBag,
  type FieldFailure,
} from "./pipeline";
