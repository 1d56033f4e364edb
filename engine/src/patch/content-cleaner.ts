/**
 * Content Cleaner - tidy file content returned by a generation model
 *
 * Strips a markdown fence that wraps the whole content, trailing whitespace
 * and runs of blank lines. If cleaning would remove most of the content, the
 * trimmed original is kept instead.
 */

const WRAPPING_FENCE = /^```[\w+.-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```[ \t]*$/;
const MERGE_CONFLICT_BLOCK = /^<<<<<<< [^\n]*\n[\s\S]*?\n=======\n[\s\S]*?\n>>>>>>> [^\n]*$/gm;

/** Above this share of removed characters the original is kept */
const MAX_REMOVED_RATIO = 0.8;

export function stripWrappingFence(content: string): string {
  const match = WRAPPING_FENCE.exec(content.trim());
  return match ? (match[1] ?? '') : content;
}

export function cleanGeneratedContent(content: string): string {
  if (!content.trim()) return '';

  const original = content.replace(/\r\n/g, '\n');
  const cleaned = stripWrappingFence(original)
    .replace(MERGE_CONFLICT_BLOCK, '')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  const removedRatio = (original.length - cleaned.length) / original.length;
  const result = !cleaned || removedRatio > MAX_REMOVED_RATIO ? original.trim() : cleaned;
  return `${result}\n`;
}
