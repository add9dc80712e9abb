import { z } from "zod";

export const chatMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

export const chatSessionSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  model: z.string(),
  messages: z.array(chatMessageSchema),
  totalCost: z.number(),
});

export const sessionSummarySchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  model: z.string(),
  totalCost: z.number(),
  preview: z.string(),
});

export const modelInfoSchema = z.object({
  id: z.string(),
  label: z.string(),
  inputRatePerMToken: z.number(),
  outputRatePerMToken: z.number(),
});

const tokenUsageSchema = z.object({
  inputTokens: z.number(),
  outputTokens: z.number(),
});

export const turnEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("delta"), text: z.string() }),
  z.object({
    type: z.literal("completed"),
    session: chatSessionSchema,
    usage: tokenUsageSchema,
    turnCost: z.number(),
    persisted: z.boolean(),
    persistError: z.string().optional(),
  }),
  z.object({
    type: z.literal("failed"),
    reason: z.enum(["connection_interrupted", "provider_error", "cancelled"]),
    message: z.string(),
    partialText: z.string(),
  }),
]);

export const modelCatalogSchema = z.object({
  models: z.array(modelInfoSchema),
  defaultModel: z.string(),
});

export const errorBodySchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});

export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type ChatSession = z.infer<typeof chatSessionSchema>;
export type SessionSummary = z.infer<typeof sessionSummarySchema>;
export type ModelInfo = z.infer<typeof modelInfoSchema>;
export type ModelCatalog = z.infer<typeof modelCatalogSchema>;
export type TokenUsage = z.infer<typeof tokenUsageSchema>;
export type TurnEvent = z.infer<typeof turnEventSchema>;

