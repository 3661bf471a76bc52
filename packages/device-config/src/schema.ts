import { z } from "zod";

const credentialValueSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const deviceSectionSchema = z
  .object({
    IP: z.object({ MGMT: z.string().trim().min(1, "IP.MGMT is required") }).passthrough(),
    REST_ADMIN: z
      .object({
        USER: credentialValueSchema.refine((value) => value.length > 0, "REST_ADMIN.USER is required"),
        PASSWORD: credentialValueSchema,
      })
      .passthrough(),
  })
  .passthrough();

export type DeviceSection = z.infer<typeof deviceSectionSchema>;

export const deviceConfigSchema = z.record(z.string(), z.unknown());

export type DeviceConfig = z.infer<typeof deviceConfigSchema>;

export const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
