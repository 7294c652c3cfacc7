const CONTROL_CHARS_REGEX = /[\u0000-\u001F\u007F]/g;
// Keep LF so section content keeps its paragraphs; strip every other control char.
const CONTROL_CHARS_EXCEPT_LF_REGEX = /[\u0000-\u0009\u000B-\u001F\u007F]/g;
// Tabs and other controls break PPTX text runs.
const PPTX_UNSAFE_CHARS_REGEX = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function sanitizeText(input: string): string {
  return input.replace(CONTROL_CHARS_REGEX, " ").replace(/\s+/g, " ").trim();
}

export function sanitizeMultilineText(input: string): string {
  return input
    .replace(/\r\n/g, "\n")
    .replace(CONTROL_CHARS_EXCEPT_LF_REGEX, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function safeLine(text: string): string {
  return text.replaceAll("\t", " ").replace(PPTX_UNSAFE_CHARS_REGEX, " ");
}
