import { z } from 'zod'
import { EXPORT_FORMATS } from '@deed-plot/types'

export const coordinateSchema = z.object({
  pointNumber: z.number().int().min(0),
  x: z.number().finite(),
  y: z.number().finite(),
  label: z.string().max(100),
  description: z.string().max(2000).default(''),
  monument: z.string().max(500).optional(),
  bearing: z.string().max(200).optional(),
  distance: z.number().finite().min(0).optional(),
  units: z.string().max(40).optional(),
})

export const anchorSchema = z.object({
  latitude: z.number().gt(-90).lt(90),
  longitude: z.number().min(-180).max(180),
})

export const closureRequestSchema = z.object({
  coordinates: z.array(coordinateSchema).min(1).max(1000),
  perimeterFeet: z.number().positive().optional(),
})

export const exportRequestSchema = z.object({
  coordinates: z.array(coordinateSchema).min(1).max(1000),
  anchor: anchorSchema.optional(),
})

export const exportFormatSchema = z.enum(EXPORT_FORMATS)

export type CoordinateInput = z.infer<typeof coordinateSchema>
export type ClosureRequestInput = z.infer<typeof closureRequestSchema>
export type ExportRequestInput = z.infer<typeof exportRequestSchema>
