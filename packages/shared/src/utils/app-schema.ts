/**
 * Zod schema for App metadata given to createApp().
 *
 * Handlers, sinks and hooks are passed alongside and are not validated here.
 */

import { z } from "zod";

export const AuthorSchema = z.object({
  name: z.string().min(1, "Author name must not be empty"),
  email: z.string().email().optional(),
});

export const AppInfoSchema = z.object({
  cmdName: z.string().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  version: z.string().optional(),
  compiled: z.date().optional(),
  authors: z.array(AuthorSchema).optional(),
  copyright: z.string().optional(),
  programPath: z.string().min(1, "Program path must not be empty").optional(),
});

export type AppInfo = z.infer<typeof AppInfoSchema>;
