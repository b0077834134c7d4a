import { execa } from 'execa';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export async function createTempGitRepo(): Promise<{ dir: string }> {
  const dir = await mkdtemp(join(tmpdir(), 'tasklane-git-'));
  await execa('git', ['init', '-q', '-b', 'main'], { cwd: dir });
  await execa('git', ['config', 'user.email', 'test@example.com'], { cwd: dir });
  await execa('git', ['config', 'user.name', 'Tasklane Test'], { cwd: dir });
  await execa('git', ['config', 'commit.gpgsign', 'false'], { cwd: dir });

  // Initial commit to diff against.
  await writeFile(join(dir, 'README.md'), '# temp\n', 'utf8');
  await execa('git', ['add', '-A'], { cwd: dir });
  await execa('git', ['commit', '-q', '-m', 'init'], { cwd: dir });

  return { dir };
}

export async function writeFileInRepo(repoDir: string, relPath: string, content: string) {
  await writeFile(join(repoDir, relPath), content, 'utf8');
}
