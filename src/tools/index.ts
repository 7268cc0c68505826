/**
 * Tools Index - Exports all EDA tools for MCP
 */

// Synthesis tool
export {
  synthesizeVerilog,
  buildSynthesisRequest,
  formatSynthesisResult,
  type SynthesisOptions,
} from "./synthesis.js";

// OpenROAD tool
export {
  runOpenroadScript,
  readStaReport,
  loadScript,
  formatOpenroadResult,
  STA_REPORT_FILE,
  type OpenroadRunOptions,
  type StaReport,
} from "./openroad.js";

// Layout sessions
export {
  layoutSessions,
  shutdownLayoutSessions,
  LayoutSessionRegistry,
  type LayoutReply,
  type LayoutSessionInfo,
} from "./layout.js";

// Synthesis -> place-and-route flow
export { runFlow, type FlowOptions, type FlowResult, type FlowStatus } from "./flow.js";

export { failureResult, notFoundResult, isExpectedFailure } from "./execution-result.js";
