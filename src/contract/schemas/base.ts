import { z } from "zod";

export const TrimmedString = z.string().trim();
export const NonEmptyString = TrimmedString.min(1);
export const RequiredUsernameSchema = TrimmedString.min(1, "Discourse username is required");
export const PositiveIntSchema = z.number().int().positive();
export const NonNegativeIntSchema = z.number().int().nonnegative();

export const HexColorSchema = TrimmedString.regex(
  /^#?(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/,
  "must be a 3- or 6-digit hex colour"
).transform((value) => value.replace(/^#/, ""));
