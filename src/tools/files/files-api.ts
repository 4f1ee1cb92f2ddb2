/**
 * Addressing for the files service. Relative references such as
 * `files/<bucket>/report.txt` live under `<endpoint>/v1/`; absolute http(s)
 * URLs are used as given.
 */
export function resolveFileUrl(endpoint: string, reference: string): string {
  if (/^https?:\/\//i.test(reference)) return reference;
  return `${endpoint.replace(/\/+$/, "")}/v1/${reference.replace(/^\/+/, "")}`;
}

export function fileNameOf(reference: string): string {
  const path = reference.split(/[?#]/)[0] ?? "";
  const last = path.split("/").filter((part) => part.length > 0).pop() ?? "";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

export function authHeaders(credential: string | undefined): Record<string, string> {
  return credential ? { "Api-Key": credential } : {};
}
