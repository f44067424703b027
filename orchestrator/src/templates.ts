export const VIDEO_TEMPLATES = {
  dance: 'Professional dance video, smooth movements, energetic atmosphere',
  walk: 'Cinematic walking shot, natural lighting, urban environment',
  nature: 'Nature documentary style, breathtaking landscapes, peaceful',
  action: 'Action movie style, dynamic camera movements, intense atmosphere',
  fashion: 'Fashion runway walk, studio lighting, high-end aesthetic',
  travel: 'Travel vlog style, adventure, exploration, scenic locations',
  celebration: 'Celebration party, joyful moments, festive atmosphere',
  workout: 'Fitness workout video, dynamic energy, gym environment'
} as const satisfies Record<string, string>;

export type VideoTemplateKey = keyof typeof VIDEO_TEMPLATES;

function isTemplateKey(value: string): value is VideoTemplateKey {
  return Object.prototype.hasOwnProperty.call(VIDEO_TEMPLATES, value);
}

// A prompt that is exactly a template name ("dance", "Travel") becomes the template text
export function expandPromptTemplate(prompt: string): string {
  const trimmed = prompt.trim();
  const key = trimmed.toLowerCase();
  return isTemplateKey(key) ? VIDEO_TEMPLATES[key] : trimmed;
}
