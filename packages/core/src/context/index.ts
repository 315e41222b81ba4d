/**
 * Context Assembly Module
 *
 * Six-step prompt assembly over the tiered cache.
 */

export {
  type ContextAssemblerDeps,
  type BuildInput,
  type BuildReport,
  type CacheLookup,
  type RetrievalLookup,
  ContextAssembler,
} from './assembler.js';

export {
  type PromptLayers,
  buildWorkingMemoryBlock,
  buildFactsSummary,
  buildCurrentEventBlock,
  assembleLayers,
} from './blocks.js';

export { ClockEnvironmentProbe, formatTimeOfDay } from './environment.js';
