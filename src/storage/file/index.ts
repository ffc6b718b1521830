export {
  STORE_FILE_INDENT,
  STORE_FILE_TEMP_SUFFIX,
  isJsonValue,
  jsonValueSchema,
  entrySchema,
} from './StoreFileTypes';

export type { StoreFileConfig, ParseResult } from './StoreFile';
export { StoreFile, parseStoreDocument, serializeStoreDocument } from './StoreFile';
