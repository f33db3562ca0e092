export {
  findConfigsRoot,
  toCondition,
  parseRuleSet,
  loadRuleSet,
  withDefaultRadius,
  parseClassificationConfig,
  loadClassificationConfig,
} from "./config.js";
