/**
 * @annotext/test-utils
 *
 * Shared test utilities: mock stages, an in-process fetch and document builders
 */

// Mock transport
export {
  createMockFetch,
  type MockFetch,
  type MockFetchConfig,
  type MockReply,
  type MockRoute,
  type RecordedRequest,
} from './mocks/mock-fetch.js';

// Mock stages
export {
  createMockStage,
  createMockFactCheckStage,
  type MockStage,
  type MockStageConfig,
} from './mocks/mock-stages.js';

// Builders
export { DocumentBuilder, testDocument, createStageContext } from './builders/document-builder.js';
