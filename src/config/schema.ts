import { z } from "zod";

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";
export const DEFAULT_MAX_TOKENS = 8192;

export const invocationSchema = z.object({
  path: z.string().min(1, "project path is required"),
  projectType: z.string().min(1, "project type is required"),
  description: z.string().min(1, "project description is required"),
  files: z
    .array(z.string().min(1, "file paths cannot be empty"))
    .min(1, "at least one file is required"),
  message: z.string().min(1, "commit message is required"),
  model: z.string().min(1).default(DEFAULT_MODEL),
  maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
});

export const environmentSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1),
});

export type InvocationInput = z.input<typeof invocationSchema>;
export type InvocationConfig = Readonly<z.infer<typeof invocationSchema>>;

export interface Environment {
  apiKey: string;
}
