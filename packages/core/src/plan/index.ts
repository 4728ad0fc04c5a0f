export {
  loadPlan,
  parsePlan,
  type LoadPlanOptions,
  type ParsePlanOptions,
} from "./loader.js";
