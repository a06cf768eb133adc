import type { IncrementalTranscriber } from "./transcriber.js";

/**
 * Tries the preferred locale, then the fallback, then anything already
 * installed. Undefined means no usable language.
 */
export async function resolveLocale(
  transcriber: IncrementalTranscriber,
  preferred: string,
  fallback: string
): Promise<string | undefined> {
  const fromPreferred = await transcriber.supportedLocale(preferred);
  if (fromPreferred) return fromPreferred;

  const fromFallback = await transcriber.supportedLocale(fallback);
  if (fromFallback) return fromFallback;

  const installed = await transcriber.installedLocales();
  return installed[0];
}
