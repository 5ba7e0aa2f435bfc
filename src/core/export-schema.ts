import { z } from "zod";

/**
 * Shape of an exported chat log. Only the fields the converter reads are
 * declared; anything else in the export is carried along untouched.
 */
export const exportDocumentSchema = z
  .object({
    chats: z.array(z.unknown()).default([]),
  })
  .passthrough();

export const exportChatSchema = z
  .object({
    contactName: z.string().nullish(),
    key: z.string().nullish(),
    messages: z.array(z.unknown()).default([]),
  })
  .passthrough();

export const exportMessageSchema = z
  .object({
    type: z.string().nullish(),
    timestamp: z.string().min(1, "timestamp is empty").nullish(),
    fromMe: z.boolean().nullish(),
    remoteResourceDisplayName: z.string().nullish(),
    text: z.string().nullish(),
  })
  .passthrough();

export type ExportDocument = z.infer<typeof exportDocumentSchema>;
export type ExportChat = z.infer<typeof exportChatSchema>;
export type ExportMessage = z.infer<typeof exportMessageSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
