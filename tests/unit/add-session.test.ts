import { WordMap } from '../../src/types';
import { createWordEntry } from '../../src/models/word-entry';
import { I18n } from '../../src/clients/translations';
import { runAddSession } from '../../src/services/add-session';
import { InterruptedError } from '../../src/utils/errors';
import { createPresenterMock, ScriptedPrompter } from '../helpers/fakes';

const translator = new I18n('en', {});

describe('Add session', () => {
  it('should add words until exitnow is typed', async () => {
    const entries: WordMap = new Map();
    const presenter = createPresenterMock();
    const prompter = new ScriptedPrompter(['dog', 'A dog barks.', 'cat', '', 'ExitNow']);

    const saved = await runAddSession(entries, { presenter, prompter, translator });

    expect(saved).toBe(2);
    expect(entries.get('dog')).toEqual({ word: 'dog', phrase: 'A dog barks.', history: [] });
    expect(entries.get('cat')).toEqual({ word: 'cat', phrase: '', history: [] });
    expect(presenter.addModeStarted).toHaveBeenCalledTimes(1);
    expect(presenter.wordSaved.mock.calls).toEqual([['dog'], ['cat']]);
    expect(presenter.addModeFinished).toHaveBeenCalledTimes(1);
  });

  it('should re-prompt for the word after a blank entry', async () => {
    const entries: WordMap = new Map();
    const prompter = new ScriptedPrompter(['   ', 'tree', 'A tall tree.', 'exitnow']);

    await runAddSession(entries, { presenter: createPresenterMock(), prompter, translator });

    expect(prompter.questions).toEqual(['WORD_PROMPT ', 'WORD_PROMPT ', 'PHRASE_PROMPT ', 'WORD_PROMPT ']);
    expect([...entries.keys()]).toEqual(['tree']);
  });

  it('should accept exitnow inside a phrase', async () => {
    const entries: WordMap = new Map();
    const prompter = new ScriptedPrompter(['word', 'say exitnow now', 'exitnow']);

    await runAddSession(entries, { presenter: createPresenterMock(), prompter, translator });

    expect(entries.get('word')?.phrase).toBe('say exitnow now');
  });

  it('should update the phrase of an existing word without touching its history', async () => {
    const entries: WordMap = new Map([['dog', createWordEntry('dog', 'Old.', ['2024-05-09'])]]);
    const prompter = new ScriptedPrompter(['dog', 'New phrase', 'exitnow']);

    await runAddSession(entries, { presenter: createPresenterMock(), prompter, translator });

    expect(entries.get('dog')).toEqual({ word: 'dog', phrase: 'New phrase', history: ['2024-05-09'] });
  });

  it('should keep words added before an interruption', async () => {
    const entries: WordMap = new Map();
    const prompter = new ScriptedPrompter(['sun', 'The sun shines.']);

    await expect(
      runAddSession(entries, { presenter: createPresenterMock(), prompter, translator })
    ).rejects.toBeInstanceOf(InterruptedError);
    expect(entries.has('sun')).toBe(true);
  });
});
