export {
  callSchema,
  callSequenceSchema,
  type CallInput,
  type CallSequenceInput,
} from './calls'

export {
  coordinateSchema,
  anchorSchema,
  closureRequestSchema,
  exportRequestSchema,
  exportFormatSchema,
  type CoordinateInput,
  type ClosureRequestInput,
  type ExportRequestInput,
} from './coordinates'
