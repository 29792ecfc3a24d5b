export { ContributorPool } from "./contributors.js";
export { SpecSelector, iterateQuotaSlots, pickLanguage } from "./selector.js";
export type { SelectionRanges, SpecSelectorOptions } from "./selector.js";
