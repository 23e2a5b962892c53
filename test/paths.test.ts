import { expect } from 'chai';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { IOError } from '../src/errors.js';
import { ensureParentDirectory, resolveConfPath } from '../src/paths.js';
import { makeTempDir, removeTempDir } from './helpers.js';

describe('Path resolution', () => {
  describe('resolveConfPath', () => {
    const home = '/home/tester';

    it('should expand a leading ~/ to the home directory', () => {
      expect(resolveConfPath('~/live/vpc/terragrunt.hcl', home)).to.equal(
        '/home/tester/live/vpc/terragrunt.hcl'
      );
    });

    it('should expand a bare ~', () => {
      expect(resolveConfPath('~', home)).to.equal('/home/tester');
    });

    it('should normalize absolute paths', () => {
      expect(resolveConfPath('/tmp/live/../x.hcl', home)).to.equal('/tmp/x.hcl');
    });

    it('should resolve relative paths against the working directory', () => {
      expect(resolveConfPath('out/terragrunt.hcl', home)).to.equal(
        path.join(process.cwd(), 'out', 'terragrunt.hcl')
      );
    });

    it('should not expand another user home prefix', () => {
      expect(resolveConfPath('~other/x.hcl', home)).to.equal(
        path.join(process.cwd(), '~other', 'x.hcl')
      );
    });
  });

  describe('ensureParentDirectory', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = makeTempDir();
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it('should create missing ancestors', async () => {
      const filePath = path.join(tempDir, 'a', 'b', 'terragrunt.hcl');

      await ensureParentDirectory(filePath);

      expect(fs.statSync(path.join(tempDir, 'a', 'b')).isDirectory()).to.equal(true);
      expect(fs.existsSync(filePath)).to.equal(false);
    });

    it('should succeed when the directory already exists', async () => {
      await ensureParentDirectory(path.join(tempDir, 'terragrunt.hcl'));

      expect(fs.statSync(tempDir).isDirectory()).to.equal(true);
    });

    it('should raise IOError when an ancestor is a file', async () => {
      const blocker = path.join(tempDir, 'blocker');
      fs.writeFileSync(blocker, '');
      const directory = path.join(blocker, 'nested');

      let caught: unknown;
      try {
        await ensureParentDirectory(path.join(directory, 'terragrunt.hcl'));
      } catch (error) {
        caught = error;
      }

      if (!(caught instanceof IOError)) {
        throw new Error('expected an IOError');
      }
      expect(caught.path).to.equal(directory);
    });
  });
});
