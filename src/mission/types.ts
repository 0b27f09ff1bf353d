import { z } from 'zod';
import { HEADINGS, isHeading } from '../engine/rover';

const HeadingSchema = z
  .string()
  .refine(isHeading, {
    message: `heading must be one of ${HEADINGS.join(', ')}`,
  });

const EdgeSchema = z.number().int().min(0);
const CoordinateSchema = z.number().int();

export const RoverPlanSchema = z.object({
  id: z.string().min(1).optional(),
  start: z.object({
    x: CoordinateSchema,
    y: CoordinateSchema,
    heading: HeadingSchema,
  }),
  // Checked by the decoder so failures carry the offending character.
  commands: z.string(),
});

export const MissionSchema = z
  .object({
    grid: z.object({
      edgeX: EdgeSchema,
      edgeY: EdgeSchema,
    }),
    rovers: z.array(RoverPlanSchema),
  })
  .superRefine((mission, ctx) => {
    mission.rovers.forEach((rover, index) => {
      const { x, y } = rover.start;
      if (x < 0 || y < 0 || x > mission.grid.edgeX || y > mission.grid.edgeY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rovers', index, 'start'],
          message: `start (${x}, ${y}) is outside the grid (0..${mission.grid.edgeX}, 0..${mission.grid.edgeY})`,
        });
      }
    });
  });

export type RoverPlan = z.infer<typeof RoverPlanSchema>;
export type Mission = z.infer<typeof MissionSchema>;

export type MissionReport =
  | { id: string; ok: true; report: string }
  | { id: string; ok: false; error: string };
