export const PLATFORM_MAX_POST_LENGTH = 280;
export const TRUNCATION_MARKER = "...";

// 플랫폼 글자 수 제한에 맞춰 자르기 (limit - 3 + "...")
export function truncateForPlatform(text: string, limit: number = PLATFORM_MAX_POST_LENGTH): string {
  const content = String(text || "");
  if (content.length <= limit) {
    return content;
  }
  const keep = Math.max(0, limit - TRUNCATION_MARKER.length);
  return `${content.slice(0, keep)}${TRUNCATION_MARKER}`;
}

export function previewText(text: string, maxChars: number = 50): string {
  const content = String(text || "").replace(/\s+/g, " ").trim();
  return content.length > maxChars ? `${content.slice(0, maxChars)}...` : content;
}
