const SOUND_DESCRIPTION = /^\[.*\]$|^\(.*\)$|^♪/;

/**
 * Whisper tends to invent text on near-silent input: bracketed sound
 * descriptions, music markers, or one word over and over.
 */
export function isHallucination(text: string): boolean {
  const normalized = text.toLowerCase().trim();

  if (normalized.length < 3) return true;
  if (SOUND_DESCRIPTION.test(normalized)) return true;

  // "thank you thank you thank you"
  const words = normalized.split(/\s+/).map((w) => w.replace(/[.,!?;:]+$/, ''));
  if (words.length >= 3) {
    const uniqueWords = new Set(words);
    if (uniqueWords.size === 1) return true;
    if (uniqueWords.size <= 2 && words.length >= 5) return true;
  }

  if (/^(.)\1{3,}$/.test(normalized)) return true;

  return false;
}
