export {
  type NameSource,
  PeopleDirectory,
  type PeopleDirectoryOptions,
  staticNameSource,
} from "./directory.ts";
export {
  formatMappingFile,
  MappingFileSource,
  type ParsedMapping,
  parseMappingFile,
  writeMappingFile,
} from "./mapping-file.ts";
export {
  FreshserviceNameSource,
  peopleToMapping,
} from "./freshservice-source.ts";
