export * from './types.js';
export {
  EmailProcessor,
  foldOutcome,
  parseSampleEmails,
  sampleSenders,
  type EmailProcessorDeps,
} from './processor.js';
export { processUserEmailsStandalone, type StandaloneOverrides } from './standalone.js';
