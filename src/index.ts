export { ContourAssembler, assembleContours } from './contours/assembler'
export { Contour } from './contours/contour'
export { ContourSet } from './contours/contour_set'
export { EndpointRegistry } from './contours/endpoint_registry'
export { InternalConsistencyError } from './contours/errors'
export { countRepeats, exciseCycles, exciseLoops, exciseQuick } from './contours/excision'
export { CycleGraph } from './contours/cycle_graph'
export { elementaryCycles } from './contours/johnson'
export { EventReader, EventReadError } from './reader/base'
export { Formatter, FormatterError } from './writer/formatter'
export { PathWriter, PathWriteError } from './writer/base'
export { traceContourFile } from './main'
export type { GridCell, Point, Segment, SegmentEvent } from './types/base'
export type { AssemblyOptions, ContourId, ContourPath, ContourPathMap } from './types/contours'
export type { EventStream } from './types/events'
export type { FormatterOptions, SerializedContours, SerializedLevel, SerializedPath } from './types/paths'
