export { ContactExtractionService } from './service.js';
export type {
  ContactExtractionServiceOptions,
  ExtractRecordsOptions,
  ExtractRecordsResult,
  ExtractionFailure,
  RunExtractionOptions,
  RunExtractionResult
} from './service.js';
export { createExtractionService } from './setup.js';
export type { CreateExtractionServiceOptions } from './setup.js';
