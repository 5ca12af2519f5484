export {
  AnthropicOracle,
  type AnthropicOracleOptions,
} from "./anthropic";
export { PacedOracle } from "./paced";
export {
  type CompletionOptions,
  createOracle,
  type TextOracle,
} from "./provider";
