export { MetadataStorage, getClassMetadata } from './metadata-storage';
