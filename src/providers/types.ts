import { z } from "zod";

// ── Chat message ──────────────────────────────────────────────────────
const ChatRoleSchema = z.enum(["user", "assistant", "system"]);

export const ChatMessageSchema = z.object({
  role: ChatRoleSchema,
  content: z.string(),
});
export type ChatMessage = z.infer<typeof ChatMessageSchema>;

// ── Outbound chat completion request ──────────────────────────────────
export const ChatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(ChatMessageSchema).length(1),
  max_tokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
});
export type ChatRequest = z.infer<typeof ChatRequestSchema>;

// ── Provider response ─────────────────────────────────────────────────
// Only the fields the client reads are modelled; anything else the
// provider sends survives in the raw payload.
const ChatChoiceSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
});

export const ChatResponseSchema = z.object({
  choices: z.array(ChatChoiceSchema),
});
export type ChatResponse = z.infer<typeof ChatResponseSchema>;
