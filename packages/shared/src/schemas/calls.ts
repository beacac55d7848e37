import { z } from 'zod'

/** A deed call as produced by the extraction step. Numeric distances are accepted and kept as text. */
export const callSchema = z.object({
  bearingText: z.string().min(1, 'Bearing is required').max(200),
  distanceText: z.union([z.string().min(1, 'Distance is required').max(100), z.number()])
    .transform((value) => String(value)),
  unit: z.string().max(40).optional(),
  monument: z.string().max(500).optional(),
  description: z.string().max(2000).optional(),
})

export const callSequenceSchema = z.object({
  calls: z.array(callSchema).min(1, 'At least one call is required').max(500),
})

export type CallInput = z.infer<typeof callSchema>
export type CallSequenceInput = z.infer<typeof callSequenceSchema>
