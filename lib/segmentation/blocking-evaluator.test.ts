import { describe, it, expect } from 'vitest';
import { BlockingEvaluator, INITIALS_PATTERN } from './blocking-evaluator';
import { CodePointText } from './code-point-text';
import { Lexicon } from './lexicon';
import { loadLexicon } from './lexicon-loader';

function lexiconOf(abbreviations: string[]): Lexicon {
  return new Lexicon({ abbreviations, titles: [], speechVerbs: [] });
}

describe('BlockingEvaluator', () => {
  const evaluator = new BlockingEvaluator(loadLexicon());

  describe('isAbbreviation', () => {
    it('should find "г" before the period in "1799 г. в"', () => {
      const source = new CodePointText('в 1799 г. в Москве');
      expect(evaluator.isAbbreviation(source, 8)).toBe(true);
    });

    it('should ignore case and surrounding spaces', () => {
      const source = new CodePointText('Читал ПРОФ. Иванов');
      expect(evaluator.isAbbreviation(source, 10)).toBe(true);
    });

    it('should not fire for an ordinary word', () => {
      const source = new CodePointText('Первое. Второе.');
      expect(evaluator.isAbbreviation(source, 6)).toBe(false);
    });

    it('should not fire at the start of the text', () => {
      expect(evaluator.isAbbreviation(new CodePointText('. Текст'), 0)).toBe(false);
    });

    it('should match multi-word abbreviations', () => {
      const custom = new BlockingEvaluator(lexiconOf(['и т.д']));
      const source = new CodePointText('груши и т.д. Всё');

      expect(custom.isAbbreviation(source, 11)).toBe(true);
    });

    it('should look back no more than 10 characters', () => {
      const custom = new BlockingEvaluator(lexiconOf(['длинноесокр', 'сокр']));
      const longOnly = new BlockingEvaluator(lexiconOf(['длинноесокр']));
      const source = new CodePointText('это длинноесокр. Дальше');

      expect(custom.isAbbreviation(source, 15)).toBe(true);
      expect(longOnly.isAbbreviation(source, 15)).toBe(false);
    });
  });

  describe('isInitialsContext', () => {
    it('should find initials anywhere within ±20 characters', () => {
      const source = new CodePointText('Поэт А. С. Пушкин жил давно');

      expect(evaluator.isInitialsContext(source, 0)).toBe(true);
      expect(evaluator.isInitialsContext(source, 10)).toBe(true);
      expect(evaluator.isInitialsContext(source, 27)).toBe(true);
    });

    it('should not see initials further than 20 characters away', () => {
      const text = 'А. Блок' + ' жил'.repeat(10) + '. Конец';
      const source = new CodePointText(text);

      expect(text.length).toBe(54);
      expect(evaluator.isInitialsContext(source, 49)).toBe(false);
      expect(evaluator.isInitialsContext(source, 9)).toBe(true);
    });

    it('should require a capitalized surname after the initials', () => {
      expect(INITIALS_PATTERN.test('А. С. Пушкин')).toBe(true);
      expect(INITIALS_PATTERN.test('А. Блок')).toBe(true);
      expect(INITIALS_PATTERN.test('А. с. пушкин')).toBe(false);
      expect(INITIALS_PATTERN.test('МГУ. Было')).toBe(false);
    });
  });

  describe('isDecimalAdjacent', () => {
    const source = new CodePointText('3.14');

    it('should fire between two digits', () => {
      expect(evaluator.isDecimalAdjacent(source, 3)).toBe(true);
    });

    it('should not fire next to the period', () => {
      expect(evaluator.isDecimalAdjacent(source, 2)).toBe(false);
    });

    it('should not fire at the text edges', () => {
      expect(evaluator.isDecimalAdjacent(source, 0)).toBe(false);
      expect(evaluator.isDecimalAdjacent(source, 4)).toBe(false);
    });
  });

  describe('evaluate', () => {
    it('should check abbreviation before initials', () => {
      const source = new CodePointText('А. С. Пушкин');
      const candidate = { offset: 6, punctuationStart: 4, rule: 'sentence_end_capital', priority: 50 };

      expect(evaluator.evaluate(source, candidate)).toBe('abbreviation');
    });

    it('should return "initials" when only the initials check fires', () => {
      const source = new CodePointText('А. С. Пушкин');
      const candidate = { offset: 3, punctuationStart: 1, rule: 'sentence_end_capital', priority: 50 };

      expect(evaluator.evaluate(source, candidate)).toBe('initials');
    });

    it('should return "decimal" for a candidate between digits', () => {
      const source = new CodePointText('3.14');
      const candidate = { offset: 3, punctuationStart: 1, rule: 'custom', priority: 1 };

      expect(evaluator.evaluate(source, candidate)).toBe('decimal');
    });

    it('should return null for a real boundary', () => {
      const source = new CodePointText('Первое. Второе.');
      const candidate = { offset: 8, punctuationStart: 6, rule: 'sentence_end_capital', priority: 50 };

      expect(evaluator.evaluate(source, candidate)).toBeNull();
    });
  });
});
