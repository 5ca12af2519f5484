export {
  EquivalenceJudge,
  type EquivalenceJudgeOptions,
  firstToken,
  parseVerdict,
} from "./equivalence";
