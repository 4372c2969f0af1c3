/**
 * @forgeloop/tool-kernel
 */

export {
  DEFAULT_POLICY,
  POLICY_FILENAME,
  PolicyEngine,
  type PolicyConfig,
} from './policy-engine.js';
export {
  parseToolBlocks,
  type ParsedToolBlocks,
  type ToolBlockError,
} from './tool-blocks.js';
export {
  createToolKernel,
  matchesPattern,
  ToolKernel,
  type RegisteredTool,
} from './tool-kernel.js';
export { createDirectoryTool } from './tools/create-directory.js';
export { deleteFileTool } from './tools/delete-file.js';
export { loadJsonTool } from './tools/load-json.js';
export { readFileTool, type ReadFileData } from './tools/read-file.js';
export { saveJsonTool } from './tools/save-json.js';
export { writeFileTool } from './tools/write-file.js';
