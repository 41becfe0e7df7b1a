import { z } from 'zod'

export const ZoomIndicatorTypeSchema = z.enum(['icon', 'number'])
export type ZoomIndicatorType = z.infer<typeof ZoomIndicatorTypeSchema>

const glyph = z.string()

// Unknown keys pass through untouched; only the shape of known keys is checked.
export const TabBarSettingsOverrideSchema = z
  .object({
    tabs: z
      .object({
        tabBarAtBottom: z.boolean().optional(),
        hideTabBarIfOnlyOneTab: z.boolean().optional(),
        tabMaxWidth: z.number().int().positive().optional(),
        unzoomOnSwitchPane: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    ui: z
      .object({
        separators: z
          .object({
            arrowSolidLeft: glyph.optional(),
            arrowSolidRight: glyph.optional(),
            arrowThinLeft: glyph.optional(),
            arrowThinRight: glyph.optional(),
          })
          .passthrough()
          .optional(),
        icons: z.record(z.string(), glyph).optional(),
        tab: z
          .object({
            zoomIndicator: z
              .object({
                enabled: z.boolean().optional(),
                type: ZoomIndicatorTypeSchema.optional(),
              })
              .passthrough()
              .optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough()

export type TabBarSettingsOverride = z.infer<typeof TabBarSettingsOverrideSchema>
