export { parseClinicalCsv } from "./csv/clinical";
