import { z } from "zod";

const month = z.number().int().min(0).max(240);

export const ageBandSchema = z.object({
  name: z.string().min(1),
  fromMonth: month,
  // Exclusive; omitted on the last, open-ended band.
  toMonth: month.optional(),
});

export const tuitionTableSchema = z.record(z.string().min(1), z.number().min(0));

export const costMultipliersSchema = z.record(z.string().min(1), z.number().positive());

export const intervalSchema = z.object({
  start: month,
  end: month,
});

export const careTypeSchema = z.enum(["center-based", "family-care"]);

const regionTableSchema = z.record(z.string().min(1), tuitionTableSchema);

export const tuitionReferenceSchema = z.object({
  "center-based": regionTableSchema,
  "family-care": regionTableSchema,
});

export type AgeBand = z.infer<typeof ageBandSchema>;
export type TuitionTable = z.infer<typeof tuitionTableSchema>;
export type CostMultipliers = z.infer<typeof costMultipliersSchema>;
export type Interval = z.infer<typeof intervalSchema>;
export type CareType = z.infer<typeof careTypeSchema>;
export type TuitionReference = z.infer<typeof tuitionReferenceSchema>;

export const CARE_TYPE_LABELS: Record<CareType, string> = {
  "center-based": "Center Based",
  "family-care": "Family Care",
};

export const USER_DATA_BRACKET = "User Data";

export const defaultAgeBands: AgeBand[] = [
  { name: "Infant", fromMonth: 0, toMonth: 12 },
  { name: "Toddler", fromMonth: 12, toMonth: 48 },
  { name: "Preschool", fromMonth: 48 },
];

export const emptyTuition: TuitionTable = {
  Infant: 0,
  Toddler: 0,
  Preschool: 0,
};
