export {
  createContentStubProvider,
  kindFromPath,
  type ContentStubProvider,
} from "./stubs.js";
