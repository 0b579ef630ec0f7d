import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  authMenu,
  createConfiguration,
  databaseMenu,
  describeConfiguration,
  featureMenu,
  parseFeatureList,
  parseFeatureSelection,
  pickFromMenu,
  resolveFromFlags,
  resolveInteractive,
  type NumberedMenu,
  type Prompter,
  type Question
} from './resolver.js';
import { UserCancelledError, ValidationError } from '../utils/errors.js';

interface ScriptedPrompter extends Prompter {
  asked: Array<{ title: string; question: Question }>;
  summaries: string[][];
}

function scriptedPrompter(answers: string[], proceed: boolean = true): ScriptedPrompter {
  const queue = [...answers];
  const prompter: ScriptedPrompter = {
    asked: [],
    summaries: [],
    async ask(menu: NumberedMenu<unknown>, question: Question) {
      prompter.asked.push({ title: menu.title, question });
      return queue.shift() ?? '';
    },
    async confirm(_message: string, summary: string[]) {
      prompter.summaries.push(summary);
      return proceed;
    }
  };
  return prompter;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('pickFromMenu', () => {
  const menu = databaseMenu();

  it('maps a 1-based number to its option', () => {
    expect(pickFromMenu(menu, '3')).toBe('mongodb');
    expect(pickFromMenu(menu, ' +2 ')).toBe('postgresql');
  });

  it.each(['', 'abc', '2.5', '0', '6', '-1'])('falls back to the default for %j', raw => {
    expect(pickFromMenu(menu, raw)).toBe('sqlite');
  });
});

describe('authMenu', () => {
  it('offers the provider first for managed backends', () => {
    expect(authMenu('supabase').options.map(option => option.value)).toEqual(['supabase', 'jwt', 'none']);
    expect(authMenu('firebase').options.map(option => option.value)).toEqual(['firebase', 'jwt', 'none']);
  });

  it('offers jwt or nothing otherwise', () => {
    for (const database of ['sqlite', 'postgresql', 'mongodb'] as const) {
      expect(authMenu(database).options.map(option => option.value)).toEqual(['jwt', 'none']);
    }
  });
});

describe('featureMenu', () => {
  it('lists features in canonical order', () => {
    expect(featureMenu().options.map(option => option.value)).toEqual([
      'alembic',
      'docker',
      'testing',
      'cors',
      'rate_limiting'
    ]);
  });
});

describe('parseFeatureSelection', () => {
  it('returns nothing for empty input', () => {
    expect(parseFeatureSelection('   ')).toEqual([]);
  });

  it('returns the selection in canonical order without duplicates', () => {
    expect(parseFeatureSelection('5 1 3 1')).toEqual(['alembic', 'testing', 'rate_limiting']);
  });

  it('drops numbers outside the menu', () => {
    expect(parseFeatureSelection('7 3 0 -1')).toEqual(['testing']);
  });

  it('discards the whole answer when a token is not a number', () => {
    expect(parseFeatureSelection('1 docker 3')).toEqual([]);
    expect(console.log).toHaveBeenCalledTimes(1);
  });
});

describe('createConfiguration', () => {
  it('trims the name and orders features', () => {
    const config = createConfiguration('  api  ', 'postgresql', 'jwt', ['cors', 'docker']);

    expect(config.name).toBe('api');
    expect([...config.features]).toEqual(['docker', 'cors']);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it.each(['', '   ', 'my api', '-api', 'a/b'])('rejects the name %j', name => {
    expect(() => createConfiguration(name, 'sqlite', 'jwt')).toThrow(ValidationError);
  });
});

describe('describeConfiguration', () => {
  it('summarises the configuration with labels', () => {
    expect(describeConfiguration(createConfiguration('api', 'postgresql', 'jwt', ['cors', 'docker']))).toEqual([
      'Project: api',
      'Database: PostgreSQL',
      'Authentication: JWT Authentication',
      'Additional features: Docker (Containerization), CORS middleware'
    ]);
  });

  it('prints None without features', () => {
    expect(describeConfiguration(createConfiguration('api', 'firebase', 'firebase'))[3]).toBe('Additional features: None');
  });
});

describe('resolveInteractive', () => {
  it('asks database, auth and features in that order', async () => {
    const prompter = scriptedPrompter(['2', '1', '4 2']);

    const config = await resolveInteractive('api', prompter);

    expect(config.database).toBe('postgresql');
    expect(config.auth).toBe('jwt');
    expect([...config.features]).toEqual(['docker', 'cors']);
    expect(prompter.asked.map(entry => entry.title)).toEqual([
      databaseMenu().title,
      authMenu('postgresql').title,
      featureMenu().title
    ]);
    expect(prompter.asked[0]?.question).toEqual({ message: 'Enter your choice (1-5)', default: '1' });
    expect(prompter.asked[1]?.question).toEqual({ message: 'Enter your choice (1-2)', default: '1' });
    expect(prompter.asked[2]?.question).toEqual({ message: 'Enter your choices', default: '' });
    expect(prompter.summaries).toEqual([
      [
        'Project: api',
        'Database: PostgreSQL',
        'Authentication: JWT Authentication',
        'Additional features: Docker (Containerization), CORS middleware'
      ]
    ]);
  });

  it('offers the provider auth menu after picking a managed backend', async () => {
    const config = await resolveInteractive('api', scriptedPrompter(['4', '1', '']));

    expect(config.database).toBe('supabase');
    expect(config.auth).toBe('supabase');
    expect(config.features.size).toBe(0);
  });

  it('falls back to defaults for out-of-range answers', async () => {
    const config = await resolveInteractive('api', scriptedPrompter(['9', 'x', '']));

    expect(config.database).toBe('sqlite');
    expect(config.auth).toBe('jwt');
  });

  it('throws a cancellation when the summary is declined', async () => {
    await expect(resolveInteractive('api', scriptedPrompter(['1', '2', ''], false))).rejects.toBeInstanceOf(
      UserCancelledError
    );
  });

  it('rejects an invalid name before asking anything', async () => {
    const prompter = scriptedPrompter(['1', '1', '']);

    await expect(resolveInteractive('bad name', prompter)).rejects.toBeInstanceOf(ValidationError);
    expect(prompter.asked).toEqual([]);
  });
});

describe('resolveFromFlags', () => {
  it('defaults to sqlite with jwt and no features', () => {
    const config = resolveFromFlags({ name: 'api' });

    expect(config.database).toBe('sqlite');
    expect(config.auth).toBe('jwt');
    expect(config.features.size).toBe(0);
  });

  it('normalizes case and feature spelling', () => {
    const config = resolveFromFlags({ name: 'api', db: ' PostgreSQL ', auth: 'NONE', features: 'rate-limiting, docker' });

    expect(config.database).toBe('postgresql');
    expect(config.auth).toBe('none');
    expect([...config.features]).toEqual(['docker', 'rate_limiting']);
  });

  it('rejects an unknown database', () => {
    expect(() => resolveFromFlags({ name: 'api', db: 'oracle' })).toThrow(
      'Invalid database: "oracle"\n\nRequirements:\n  • must be one of: sqlite, postgresql, mongodb, supabase, firebase'
    );
  });

  it('rejects an unknown auth kind', () => {
    expect(() => resolveFromFlags({ name: 'api', auth: 'oauth' })).toThrow(ValidationError);
  });
});

describe('parseFeatureList', () => {
  it('drops unknown and empty tokens', () => {
    expect(parseFeatureList('testing,,bogus, CORS')).toEqual(['testing', 'cors']);
  });
});
