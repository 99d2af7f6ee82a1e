export {
  DEFAULT_SEGMENT_SIZE_BYTES,
  LargeObject,
  deleteWithSegments,
  loadLargeObject,
  type AppendOptions,
  type NewLargeObjectOptions,
  type SegmentInfo,
  type SegmentingStrategy,
} from './large-object.js';
