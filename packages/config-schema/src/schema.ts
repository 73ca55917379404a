import { z } from "zod";

const PlaceholderUrlSchema = z
  .string()
  .refine((value) => /^https?:\/\//.test(value), "URL template must start with http:// or https://");

const CountryCodeSchema = z.string().regex(/^\d{1,4}$/, "countryCode must be 1-4 digits");

export const DocumentTemplateSchema = z.object({
  integratedNumber: z.string().min(1).default("919270334724"),
  contentType: z.string().min(1).default("template"),
  templateName: z.string().min(1).default("kurlaaa"),
  languageCode: z.string().min(1).default("en"),
  languagePolicy: z.string().min(1).default("deterministic"),
  namespace: z.string().min(1).default("bef520bd_6b38_4231_8cd9_2f253f10a1dd"),
  countryCode: CountryCodeSchema.default("91"),
  documentUrl: PlaceholderUrlSchema.default(
    "https://mahainformatics.com/files/andheri/{{applicationId}}.pdf"
  ),
  caption: z
    .string()
    .min(1)
    .default("Namaste🙏 {{applicantName}} check your {{applicationType}} certificate")
});

export const BodyTemplateSchema = z.object({
  templateName: z.string().min(1).default("certificate_ready"),
  languageCode: z.string().min(1).default("en"),
  countryCode: CountryCodeSchema.default("91"),
  firstParameter: z.enum(["applicantName", "applicationId"]).default("applicantName"),
  certificateUrl: PlaceholderUrlSchema.default(
    "https://mahainformatics.com/files/kurla/{{applicationId}}.pdf"
  ),
  message: z
    .string()
    .min(1)
    .default("Your {{applicationType}} certificate is ready. Download it here: {{certificateUrl}}")
});

export const TemplateConfigSchema = z.object({
  documentTemplate: DocumentTemplateSchema.default({}),
  bodyTemplate: BodyTemplateSchema.default({})
});

export type TemplateConfig = z.infer<typeof TemplateConfigSchema>;
export type DocumentTemplate = z.infer<typeof DocumentTemplateSchema>;
export type BodyTemplate = z.infer<typeof BodyTemplateSchema>;
