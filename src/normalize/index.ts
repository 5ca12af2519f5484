export {
  fallbackPhrase,
  type NormalizeResult,
  type NormalizeSource,
  TextNormalizer,
  type TextNormalizerOptions,
} from "./normalizer";
export { buildNormalizePrompt } from "./prompts";
export {
  DEFAULT_REPAIR_RULES,
  ensureToPrefix,
  finishPhrase,
  type RepairedPhrase,
  type ResponseRepairRule,
  repairResponse,
} from "./repair";
export { containsHebrew, detectScript, type SourceScript } from "./script";
