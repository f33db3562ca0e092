export { createPoi, describeTags, comparePois, sortPois } from "./poi.js";
