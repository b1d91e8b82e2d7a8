export { programs } from './programs';
export { eligibilityCriteria } from './eligibility-criteria';
export { incomeLimits } from './income-limits';
export { fplTables } from './fpl-tables';
export { documents, programDocuments } from './documents';
