export {
  formatCoordinate,
  writeGpxWaypoints,
  writePoisJson,
  writePoisFile,
  GPX_NAMESPACE,
} from "./writers.js";
