import { z } from "zod";

const rawField = z.string().nullish();

export const RawRecordSchema = z.object({
    patient_id: rawField,
    full_name: rawField,
    gender: rawField,
    date_of_birth: rawField,
    phone: rawField,
    admission_time: rawField,
    discharge_time: rawField,
    vital_type: rawField,
    vital_value: rawField,
    lab_test: rawField,
    lab_result: rawField,
});

export type RawRecord = z.infer<typeof RawRecordSchema>;

export const GenderSchema = z.enum(["M", "F", "Unknown"]);
export const VitalTypeSchema = z.enum(["Temperature", "Heart Rate", "Blood Pressure", "Unknown"]);
export const LabTestSchema = z.enum(["WBC", "Hgb", "Creatinine", "Unknown"]);

export type Gender = z.infer<typeof GenderSchema>;
export type VitalType = z.infer<typeof VitalTypeSchema>;
export type LabTest = z.infer<typeof LabTestSchema>;

export const CalendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);   // YYYY-MM-DD
export const TimestampSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/); // zone-less

export const PhoneSchema = z.object({
    number: z.string().regex(/^\+\d+$/).nullable(),
    isInvalid: z.boolean(),
});

export const CleanRecordSchema = z.object({
    patientId: z.string().regex(/^P-\d{4}$/),
    fullName: z.string().min(1),
    gender: GenderSchema,
    dateOfBirth: CalendarDateSchema.nullable(),
    admissionTime: TimestampSchema.nullable(),
    dischargeTime: TimestampSchema.nullable(),
    phone: PhoneSchema,
    vitalType: VitalTypeSchema,
    vitalValue: z.string().nullable(),
    labTest: LabTestSchema,
    labResult: z.string().nullable(),
});

export type CleanRecord = z.infer<typeof CleanRecordSchema>;
export type Phone = z.infer<typeof PhoneSchema>;

/** Deduplicated records keyed by patient id, in first-seen order. */
export type CanonicalDataset = ReadonlyMap<string, CleanRecord>;
