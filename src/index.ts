export * from './types/metadata';
export * from './utils/errors';
export { default as logger } from './utils/logger';
export * from './config/settings';
export * from './services/standards/vocabularies';
export * from './services/standards/fieldNormalizers';
export * from './services/standards/fieldRegistry';
export * from './services/io/metadataIO';
export * from './services/validation/tableValidator';
export * from './services/validation/crossTableReconciler';
export * from './services/files/fileResolver';
export * from './services/files/sequenceFiles';
export * from './services/templates/templateGenerator';
export * from './services/pipeline/submissionPrep';
