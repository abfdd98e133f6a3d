import { z } from 'zod';
import { cleanInlineMarkdown } from '../../m1-parse/src/inline-cleaner.js';
import lexiconData from '../data/prompt-lexicon.json';

const LexiconSchema = z.object({
  stopwords: z.array(z.string()),
  abstractWords: z.array(z.string()),
  verbEndings: z.array(z.string()),
  placeEndings: z.array(z.string()),
  negativeCues: z.array(z.string())
});

export type PromptLexicon = z.infer<typeof LexiconSchema>;

export const DEFAULT_LEXICON: PromptLexicon = LexiconSchema.parse(lexiconData);

/**
 * `style-prefix` sends the paragraph itself behind a fixed style description;
 * `keywords` reduces it to an action plus scene nouns first.
 */
export type PromptStrategy = 'style-prefix' | 'keywords';

export interface PromptBuilderOptions {
  strategy: PromptStrategy;
  stylePrefix: string;
  /** `{title}` is replaced with the document title. */
  coverTemplate: string;
  includeNegative: boolean;
}

export const DEFAULT_STYLE_PREFIX =
  'Ilustración estilo cómic educativo, colores vivos, sin texto ni tipografías en la imagen, ' +
  'composición limpia, iluminación suave, trazo definido. Escena: ';

export const DEFAULT_COVER_TEMPLATE =
  'Portada educativa estilo cómic, limpia, con símbolos numéricos sutiles, sin texto sobreimpreso. Título: {title}';

export const DEFAULT_PROMPT_OPTIONS: PromptBuilderOptions = {
  strategy: 'style-prefix',
  stylePrefix: DEFAULT_STYLE_PREFIX,
  coverTemplate: DEFAULT_COVER_TEMPLATE,
  includeNegative: true
};

const WORD_RE = /[A-Za-zÁÉÍÓÚÜÑáéíóúüñ\-']{3,}/g;
const MAX_SCENE_ELEMENTS = 10;

export class PromptBuilder {
  private options: PromptBuilderOptions;

  constructor(
    options: Partial<PromptBuilderOptions> = {},
    private lexicon: PromptLexicon = DEFAULT_LEXICON
  ) {
    this.options = { ...DEFAULT_PROMPT_OPTIONS, ...options };
  }

  forParagraph(text: string, documentTitle: string = ''): string {
    if (this.options.strategy === 'keywords') {
      return synthesizeScene(text, documentTitle, this.lexicon);
    }
    return this.options.stylePrefix + cleanInlineMarkdown(text);
  }

  forDirective(text: string): string {
    return this.options.stylePrefix + cleanInlineMarkdown(text);
  }

  forCover(title: string): string {
    return this.options.stylePrefix + this.options.coverTemplate.split('{title}').join(title);
  }

  negativePrompt(): string | undefined {
    return this.options.includeNegative ? this.lexicon.negativeCues.join(', ') : undefined;
  }
}

/**
 * Keyword scene for diffusion models that follow tag lists better than prose.
 * Words ending like infinitives or gerunds count as actions; everything else
 * that is not an abstract noun counts as scenery.
 */
export function synthesizeScene(text: string, documentTitle: string = '', lexicon: PromptLexicon = DEFAULT_LEXICON): string {
  const raw = cleanInlineMarkdown(documentTitle ? `${documentTitle}. ${text}` : text);
  const stopwords = new Set(lexicon.stopwords);
  const abstractWords = new Set(lexicon.abstractWords);

  const words = (raw.match(WORD_RE) ?? [])
    .map(word => word.toLowerCase())
    .filter(word => !stopwords.has(word));

  const isVerb = (word: string) => lexicon.verbEndings.some(ending => word.endsWith(ending));
  const verbs = unique(words.filter(isVerb));
  const nouns = unique(words.filter(word => !isVerb(word) && !abstractWords.has(word)));
  const places = nouns.filter(word => lexicon.placeEndings.some(ending => word.endsWith(ending)));

  const subjects = nouns.slice(0, 6);
  const objects = nouns.length > 0 ? nouns.slice(0, 8) : ['main concept'];
  const action = verbs[0] ?? 'illustrating';
  const scene = unique([...subjects, ...objects, ...places.slice(0, 3)])
    .slice(0, MAX_SCENE_ELEMENTS)
    .join(', ');

  return (
    'illustration, highly detailed, concept art, cinematic lighting, bright colors, ' +
    `${action}, ${scene}, child-friendly, clean composition, professional artstation style, ` +
    'soft shadows, realistic proportions, high quality, 4k'
  );
}

function unique(items: string[]): string[] {
  return [...new Set(items.filter(item => item.trim().length > 0))];
}
