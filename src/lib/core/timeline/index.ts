export type { EventTimeline, TimelineKind } from "./types";
export { BufferedTimeline } from "./buffered-timeline";
export { StreamedTimeline, type StreamedTimelineOptions } from "./streamed-timeline";
export { CheckpointIndex } from "./checkpoint-index";
export { decodeAllEvents, scanStream, type DecodedEvents, type StreamScanResult } from "./decode";
export { readRange } from "./range";
