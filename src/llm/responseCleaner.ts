export const END_MARKER = 'END SCENE';

// sentence end, optionally followed by closing quotes, brackets or emphasis
const SENTENCE_END = /[.!?…]["'”’)\]*]*/g;

/**
 * Cuts a generated scene at the END SCENE marker and drops any trailing
 * fragment after the last complete sentence. Text without a sentence end
 * is returned as it is after the cut.
 */
export function cleanScene(text: string): string {
  const scene = text.split(END_MARKER)[0].trim();
  if (!scene) return scene;

  let cut = -1;
  for (const match of scene.matchAll(SENTENCE_END)) {
    cut = (match.index ?? 0) + match[0].length;
  }
  return cut === -1 ? scene : scene.slice(0, cut).trim();
}
