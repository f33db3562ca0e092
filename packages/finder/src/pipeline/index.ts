export {
  findPois,
  collectPois,
  ELEMENT_KINDS,
  type FindPoisOptions,
  type FindPoisResult,
} from "./find-pois.js";
