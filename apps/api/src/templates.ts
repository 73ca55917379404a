import {
  interpolateVariables,
  type BodyTemplate,
  type DocumentTemplate
} from "@sheet_relay/config-schema";
import { mapRecord, type MappedRecord, type SheetRecord } from "./record";

export type DocumentTemplatePayload = {
  integrated_number: string;
  content_type: string;
  payload: {
    messaging_product: "whatsapp";
    type: "template";
    template: {
      name: string;
      language: { code: string; policy: string };
      namespace: string;
      to_and_components: Array<{
        to: string[];
        components: {
          header_1: { filename: string; type: "document"; value: string };
          body_1: { type: "text"; value: string };
        };
      }>;
    };
  };
};

export type BodyTemplatePayload = {
  messaging_product: "whatsapp";
  recipient_type: "individual";
  to: string;
  type: "template";
  template: {
    name: string;
    language: { code: string };
    components: Array<{
      type: "body";
      parameters: Array<{ type: "text"; text: string }>;
    }>;
  };
};

function variablesFor(record: MappedRecord): Record<string, string> {
  return {
    applicationId: record.applicationId,
    applicantName: record.applicantName,
    applicationType: record.applicationType
  };
}

export function buildDocumentPayload(
  template: DocumentTemplate,
  record: MappedRecord
): DocumentTemplatePayload {
  const variables = variablesFor(record);

  return {
    integrated_number: template.integratedNumber,
    content_type: template.contentType,
    payload: {
      messaging_product: "whatsapp",
      type: "template",
      template: {
        name: template.templateName,
        language: {
          code: template.languageCode,
          policy: template.languagePolicy
        },
        namespace: template.namespace,
        to_and_components: [
          {
            to: [`${template.countryCode}${record.phone}`],
            components: {
              header_1: {
                filename: record.applicationId,
                type: "document",
                value: interpolateVariables(template.documentUrl, variables)
              },
              body_1: {
                type: "text",
                value: interpolateVariables(template.caption, variables)
              }
            }
          }
        ]
      }
    }
  };
}

export function buildBodyPayload(template: BodyTemplate, record: MappedRecord): BodyTemplatePayload {
  const variables = variablesFor(record);
  const certificateUrl = interpolateVariables(template.certificateUrl, variables);
  const message = interpolateVariables(template.message, { ...variables, certificateUrl });

  return {
    messaging_product: "whatsapp",
    recipient_type: "individual",
    to: `${template.countryCode}${record.phone}`,
    type: "template",
    template: {
      name: template.templateName,
      language: { code: template.languageCode },
      components: [
        {
          type: "body",
          parameters: [
            { type: "text", text: record[template.firstParameter] },
            { type: "text", text: message }
          ]
        }
      ]
    }
  };
}

/** Maps then builds; null when the record lacks a phone number or application id. */
export function documentPayloadFor(template: DocumentTemplate, record: SheetRecord) {
  const mapped = mapRecord(record);
  return mapped.ok ? buildDocumentPayload(template, mapped.record) : null;
}

export function bodyPayloadFor(template: BodyTemplate, record: SheetRecord) {
  const mapped = mapRecord(record);
  return mapped.ok ? buildBodyPayload(template, mapped.record) : null;
}
