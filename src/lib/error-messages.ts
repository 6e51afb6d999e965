// src/lib/error-messages.ts
export const ERR_MSG = {
  INVALID_REQUEST: "Request validation failed",
  RESOURCE_NOT_FOUND: "File not found",
  RESOURCE_OUTSIDE_ROOT: "Resource path must stay inside the input directory",
  RESOURCE_REQUIRED: "Request must include a resource",
  ARCHIVE_UNREADABLE: "Archive could not be extracted",
  ARCHIVE_ENTRY_OUTSIDE: "Archive entries must stay inside the extraction directory",
  ARCHIVE_LINK: "Archives may not contain links",
  ARCHIVE_EMPTY: "Archive contains no files",
  UPLOAD_TOO_LARGE: "Uploaded file exceeds the maximum size of {limit} bytes",
  TICKET_NOT_FOUND: "Ticket not found",
  TICKET_NOT_READY: "Job has not completed yet",
  JOB_FAILED: "Job failed",
  ARTIFACT_MISSING: "Resource does not exist",
  RATE_LIMIT: "Too many requests, please try again shortly",
  UNAUTHORIZED: "Valid x-api-key header required",
  INTERNAL_UNEXPECTED: "Something went wrong",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}

// Optional tiny templating for limits/caps
export function fmt(key: ErrKey, vars: Record<string, string | number> = {}): string {
  let s: string = ERR_MSG[key];
  for (const [k, v] of Object.entries(vars)) s = s.replace(new RegExp(`{${k}}`, "g"), String(v));
  return s;
}
