import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import {
  applyToEnv,
  exportLine,
  profileMentions,
  profilesFor,
  reconcileProfile,
  wirePath,
} from '../installer/path-plan.js';
import type { EnvironmentPlan } from '../installer/types.js';
import { makeContext, tempRoot } from './helpers.js';

describe('exportLine', () => {
  it('renders posix prepend and append lines', () => {
    expect(exportLine({ dirs: ['/root/tools/bin'], position: 'prepend' }, 'posix')).toBe(
      'export PATH="/root/tools/bin:$PATH"'
    );
    expect(
      exportLine({ dirs: ['/usr/local/go/bin', '/opt/homebrew/bin'], position: 'append' }, 'posix')
    ).toBe('export PATH="$PATH:/usr/local/go/bin:/opt/homebrew/bin"');
  });

  it('renders fish_add_path lines', () => {
    expect(exportLine({ dirs: ['/root/tools/bin'], position: 'prepend' }, 'fish')).toBe(
      'fish_add_path /root/tools/bin'
    );
    expect(exportLine({ dirs: ['/a', '/b'], position: 'append' }, 'fish')).toBe('fish_add_path -a /a /b');
  });
});

describe('profileMentions', () => {
  it('matches a directory as a whole PATH element', () => {
    expect(profileMentions('export PATH="/home/u/tools/bin:$PATH"', '/home/u/tools/bin')).toBe(true);
    expect(profileMentions('export PATH=$PATH:/home/u/tools/bin\n', '/home/u/tools/bin')).toBe(true);
  });

  it('does not match a longer directory name', () => {
    expect(profileMentions('export PATH="/home/u/tools/bin2:$PATH"', '/home/u/tools/bin')).toBe(false);
  });
});

describe('reconcileProfile', () => {
  const plan: EnvironmentPlan = {
    entries: [
      { dirs: ['/usr/local/go/bin'], position: 'prepend' },
      { dirs: ['/opt/tools/bin'], position: 'prepend' },
    ],
  };

  it('creates a missing profile and is idempotent on re-run', () => {
    const file = path.join(tempRoot(), '.bashrc');

    const first = reconcileProfile({ file, syntax: 'posix' }, plan);
    const second = reconcileProfile({ file, syntax: 'posix' }, plan);

    expect(first.added).toEqual([
      'export PATH="/usr/local/go/bin:$PATH"',
      'export PATH="/opt/tools/bin:$PATH"',
    ]);
    expect(second.added).toEqual([]);
    expect(fs.readFileSync(file, 'utf-8')).toBe(
      'export PATH="/usr/local/go/bin:$PATH"\nexport PATH="/opt/tools/bin:$PATH"\n'
    );
  });

  it('only appends entries the profile does not mention', () => {
    const file = path.join(tempRoot(), '.bashrc');
    fs.writeFileSync(file, 'alias ll="ls -l"\nexport PATH="/usr/local/go/bin:$PATH"');

    const update = reconcileProfile({ file, syntax: 'posix' }, plan);

    expect(update.added).toEqual(['export PATH="/opt/tools/bin:$PATH"']);
    expect(fs.readFileSync(file, 'utf-8')).toBe(
      'alias ll="ls -l"\nexport PATH="/usr/local/go/bin:$PATH"\nexport PATH="/opt/tools/bin:$PATH"\n'
    );
  });

  it('leaves a missing fish config alone', () => {
    const file = path.join(tempRoot(), 'config.fish');

    const update = reconcileProfile({ file, syntax: 'fish' }, plan);

    expect(update.added).toEqual([]);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('writes nothing in dry-run mode', () => {
    const file = path.join(tempRoot(), '.zshrc');

    const update = reconcileProfile({ file, syntax: 'posix' }, plan, { dryRun: true });

    expect(update.added).toHaveLength(2);
    expect(fs.existsSync(file)).toBe(false);
  });
});

describe('applyToEnv', () => {
  it('prepends and appends without duplicating', () => {
    const env: NodeJS.ProcessEnv = { PATH: '/usr/bin:/bin' };

    applyToEnv(env, { dirs: ['/opt/tools/bin'], position: 'prepend' });
    applyToEnv(env, { dirs: ['/opt/tools/bin'], position: 'prepend' });
    applyToEnv(env, { dirs: ['/usr/local/go/bin', '/usr/bin'], position: 'append' });

    expect(env.PATH).toBe('/opt/tools/bin:/usr/bin:/bin:/usr/local/go/bin');
  });
});

describe('profilesFor', () => {
  it('uses .bashrc on Linux and .zshrc plus .bashrc on macOS', () => {
    const home = tempRoot();
    expect(profilesFor('linux', home)).toEqual([{ file: path.join(home, '.bashrc'), syntax: 'posix' }]);
    expect(profilesFor('darwin', home)).toEqual([
      { file: path.join(home, '.zshrc'), syntax: 'posix' },
      { file: path.join(home, '.bashrc'), syntax: 'posix' },
    ]);
  });

  it('adds the fish config when it exists', () => {
    const home = tempRoot();
    const fishConfig = path.join(home, '.config', 'fish', 'config.fish');
    fs.mkdirSync(path.dirname(fishConfig), { recursive: true });
    fs.writeFileSync(fishConfig, '');

    expect(profilesFor('linux', home)).toContainEqual({ file: fishConfig, syntax: 'fish' });
  });
});

describe('wirePath', () => {
  it('puts the bin directory on PATH and writes it once per profile', () => {
    const { ctx, sysBin } = makeContext({ config: { platform: 'darwin' } });
    const line = `export PATH="${ctx.config.binDir}:$PATH"`;

    wirePath(ctx);
    wirePath(ctx);

    expect(ctx.env.PATH).toBe(`${ctx.config.binDir}:${sysBin}`);
    for (const name of ['.zshrc', '.bashrc']) {
      const content = fs.readFileSync(path.join(ctx.config.home, name), 'utf-8');
      expect(content).toBe(`${line}\n`);
    }
  });
});
