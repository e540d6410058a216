import { z } from "zod";

const pricingMode = z.enum(["spot", "on-demand"]);

export const jobRequestSchema = z
  .object({
    gpuType: z.string().trim().min(1),
    count: z.number().int().positive(),
    budgetPerHour: z.number().finite().positive().optional(),
    durationHours: z.number().finite().positive().optional(),
    minFulfillment: z.number().int().positive().optional(),
    region: z.string().trim().min(1).optional(),
    pricingMode: pricingMode.optional(),
    diversificationLimit: z.number().finite().gt(0).max(1).optional(),
  })
  .strict()
  .refine((r) => r.minFulfillment === undefined || r.minFulfillment <= r.count, {
    message: "minFulfillment cannot exceed count",
    path: ["minFulfillment"],
  });

export const quoteQuerySchema = z.object({
  gpuType: z.string().trim().min(1),
  region: z.string().trim().min(1).optional(),
  pricingMode: pricingMode.optional(),
});

export const rollbackSchema = z.object({
  version: z.number().int().positive(),
});
