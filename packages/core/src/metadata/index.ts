export {
  CranDbMetadataSource,
  StaticMetadataSource,
  DEFAULT_METADATA_URL,
  extractDependencies,
  toPackageRecord,
  type MetadataSource,
  type CranDbMetadataSourceConfig,
} from './MetadataSource.js'
export { createPackageRecord, type PackageRecordInput } from './package-record.js'
export { CranPackageSchema, type CranPackage } from './schemas.js'
