export { CommitTranslator, isEmptyPatch } from './commit_translator';
export type {
  CommitTranslatorDependencies,
  TranslationFailureKind,
  TranslationResult,
} from './translator.types';
