import { z } from "zod";

import { validateAgeBands } from "./ageBands";
import { ConfigurationError } from "./errors";
import { ageBandSchema, costMultipliersSchema, defaultAgeBands } from "./schemas";

const wholeMonths = z.number().int().min(0);

export const agesConfigSchema = z.object({
  minAge: wholeMonths,
  maxAge: wholeMonths,
  defaultStart: wholeMonths,
  defaultEnd: wholeMonths,
  step: z.number().int().positive(),
});

export const themeConfigSchema = z.object({
  highlightColor: z.string().min(1),
  mutedColor: z.string().min(1),
  fadedOpacity: z.number().min(0).max(1),
});

export const appConfigSchema = z.object({
  ages: agesConfigSchema,
  costMultipliers: costMultipliersSchema,
  defaultBracket: z.string().min(1),
  ageBands: z.array(ageBandSchema).min(1),
  chart: z.object({
    tickStride: z.number().int().positive(),
    tickMinGap: z.number().min(0),
  }),
  theme: themeConfigSchema,
});

export type AgesConfig = z.infer<typeof agesConfigSchema>;
export type ThemeConfig = z.infer<typeof themeConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

export const defaultTheme: ThemeConfig = {
  highlightColor: "rgba(65,40,200,1)",
  mutedColor: "rgba(60,60,60,0.25)",
  fadedOpacity: 0.2,
};

export const defaultAppConfig: AppConfig = {
  ages: {
    minAge: 0,
    maxAge: 72,
    defaultStart: 6,
    defaultEnd: 60,
    step: 1,
  },
  costMultipliers: {
    Low: 0.8,
    Average: 1,
    High: 1.25,
  },
  defaultBracket: "Average",
  ageBands: defaultAgeBands,
  chart: {
    tickStride: 10,
    tickMinGap: 3,
  },
  theme: defaultTheme,
};

export function loadAppConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const parsed = appConfigSchema.safeParse({ ...defaultAppConfig, ...overrides });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new ConfigurationError(`Invalid app configuration (${detail}).`);
  }

  const config = parsed.data;
  const { minAge, maxAge, defaultStart, defaultEnd, step } = config.ages;
  if (!(minAge <= defaultStart && defaultStart <= defaultEnd && defaultEnd <= maxAge)) {
    throw new ConfigurationError(
      `Ages must satisfy min ≤ default start ≤ default end ≤ max, got ${minAge}, ${defaultStart}, ${defaultEnd}, ${maxAge}.`,
    );
  }
  const offGrid = [defaultStart, defaultEnd].filter((month) => month !== maxAge && (month - minAge) % step !== 0);
  if (offGrid.length) {
    throw new ConfigurationError(
      `Default interval months ${offGrid.join(", ")} are not on the ${step}-month grid starting at ${minAge}.`,
    );
  }
  if (!Object.hasOwn(config.costMultipliers, config.defaultBracket)) {
    throw new ConfigurationError(`Default bracket "${config.defaultBracket}" has no multiplier.`);
  }
  validateAgeBands(config.ageBands, maxAge);

  return config;
}
