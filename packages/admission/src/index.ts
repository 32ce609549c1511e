// packages/admission/src/index.ts

export { admissionGuard, type AdmissionGuardOptions } from "./guard";
export { requireRole } from "./requireRole";
