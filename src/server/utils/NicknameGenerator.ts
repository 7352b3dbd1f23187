const adjectives = [
  'Brave', 'Swift', 'Mighty', 'Clever', 'Lucky',
  'Silent', 'Nimble', 'Noble', 'Bold', 'Happy',
  'Sliding', 'Stacked', 'Doubled', 'Shiny', 'Golden',
  'Tiny', 'Giant', 'Quick', 'Calm', 'Merry'
];

const nouns = [
  'Tile', 'Block', 'Cube', 'Brick', 'Square',
  'Stack', 'Slider', 'Merger', 'Pair', 'Grid',
  'Corner', 'Column', 'Row', 'Combo', 'Chain',
  'Marker', 'Doubler', 'Builder', 'Puzzler', 'Tower'
];

export function generateNickname(random: () => number = Math.random): string {
  const adjective = adjectives[Math.floor(random() * adjectives.length)];
  const noun = nouns[Math.floor(random() * nouns.length)];
  const number = Math.floor(random() * 100);
  return `${adjective}${noun}${number}`;
}

const MAX_NICKNAME_LENGTH = 20;

/**
 * Strip markup characters and clamp length; falls back to a generated name
 */
export function sanitizeNickname(raw: unknown): string {
  if (typeof raw !== 'string') return generateNickname();
  const nickname = raw.replace(/[<>]/g, '').trim().substring(0, MAX_NICKNAME_LENGTH);
  return nickname.length > 0 ? nickname : generateNickname();
}
