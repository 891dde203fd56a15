export const DEFAULT_IMAGE_PROMPT = `Convert the image to markdown

Formulae should be in latex format between $ like $a=\\frac{b}{c}$.
Use simple $ not $$.

Output only the markdown text.`;

export const PROMPT_SIDECAR_SUFFIX = '_prompt.md';
