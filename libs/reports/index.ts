export { assessRawQuality, summarizeCleanQuality, type RawQuality, type CleanQuality } from "./quality";
export {
    ageDistribution,
    ageInYears,
    genderDistribution,
    lengthOfStay,
    admissionTrend,
    type AgeBucket,
    type StayLength,
    type AdmissionDay,
} from "./analytics";
