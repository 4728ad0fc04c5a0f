export {
  createOwnershipManifest,
  type OwnershipApplier,
  type OwnershipManifest,
  type OwnershipRecord,
} from "./manifest.js";
