import { z } from "zod";
import { RiskCriteriaSchema } from "./assessment";

export const AssessVendorRequestSchema = z.object({
  domain: z
    .string()
    .trim()
    .min(1, "Domain is required")
    .describe("The vendor domain or URL to assess"),
  criteria: RiskCriteriaSchema.default({}),
  vendor: z
    .object({
      name: z.string().min(1).optional(),
      trustCenterUrl: z.string().url("Trust center URL must be a valid URL").optional(),
      contactEmail: z.string().email("Contact email must be a valid email").optional(),
      contactName: z.string().min(1).optional(),
    })
    .default({}),
});

export type AssessVendorRequest = z.infer<typeof AssessVendorRequestSchema>;
export type AssessVendorRequestInput = z.input<typeof AssessVendorRequestSchema>;
