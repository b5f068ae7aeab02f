export {
  decodeMetadataValue,
  encodeMetadataValue,
  extractResolutionMetadata,
  mergeMetadata,
} from './extract';
