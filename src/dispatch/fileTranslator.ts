import * as fs from 'fs';
import * as path from 'path';
import { SourceIOError } from '../core/errors';
import { TranslationOutput } from '../core/types';
import { TranslationContext } from '../dify/translator';

/**
 * Anything that turns a document into its translation
 */
export interface TextTranslator {
  translate(text: string, targetLanguage: string, context?: TranslationContext): Promise<TranslationOutput>;
}

export type FileTranslationResult =
  | { ok: true; output: TranslationOutput }
  | { ok: false; error: Error };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Translate one source file into the target tree.
 *
 * Failures are returned, not thrown. The target file is only written once
 * the translation has fully succeeded, so a failed file keeps whatever an
 * earlier run left there.
 */
export class FileTranslator {
  constructor(
    private readonly translator: TextTranslator,
    private readonly sourceRoot: string,
    private readonly targetRoot: string,
    private readonly targetLanguage: string
  ) {}

  async translateFile(relativePath: string, context?: TranslationContext): Promise<FileTranslationResult> {
    const sourceFile = path.join(this.sourceRoot, relativePath);
    const targetFile = path.join(this.targetRoot, relativePath);

    try {
      let content: string;
      try {
        content = await fs.promises.readFile(sourceFile, 'utf-8');
      } catch (error) {
        throw new SourceIOError(sourceFile, error);
      }

      const output = await this.translator.translate(content, this.targetLanguage, context);

      await fs.promises.mkdir(path.dirname(targetFile), { recursive: true });
      await fs.promises.writeFile(targetFile, output.text, 'utf-8');

      return { ok: true, output };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }
}
