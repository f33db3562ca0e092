/**
 * Raw elements as returned by the Overpass API, after decoding.
 */

/** Scalar tag value. Upstream tags are almost always strings. */
export type TagValue = string | number | boolean | null;

export type Tags = Record<string, TagValue>;

/** A point element */
export interface RawNode {
  type: "node";
  id: number;
  lat: number;
  lon: number;
  tags: Tags;
}

/** A polyline element - an ordered list of node references */
export interface RawWay {
  type: "way";
  id: number;
  nodes: number[];
  tags: Tags;
}

export type RawElement = RawNode | RawWay;
