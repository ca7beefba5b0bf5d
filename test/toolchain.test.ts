import { expect } from 'chai';
import 'mocha';
import fs from 'fs';
import path from 'path';
import {
  DEFAULT_COMPILER, DEFAULT_TOOLCHAIN_PATTERNS, expandHome, findCompiler, listPackages, platformioPackagesDir, prependPath,
} from '../src/toolchain/index';
import { tmpDir } from './util';

describe('toolchain', () => {
  let home: string;
  let packages: string;

  // lay out ~/.platformio/packages/<name>/bin, with or without the compiler in it
  const install = (name: string, withCompiler = true) => {
    const bin = path.join(packages, name, 'bin');
    fs.mkdirSync(bin, { recursive: true });
    if (withCompiler) fs.writeFileSync(path.join(bin, DEFAULT_COMPILER), '');
    return bin;
  };

  beforeEach(() => {
    home = tmpDir('fwpipe-home-');
    packages = platformioPackagesDir(home);
    fs.mkdirSync(packages, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  describe('findCompiler', () => {
    it('should find the toolchain matching the first pattern', async () => {
      const bin = install('toolchain-riscv32-esp@14.2.0+20241119');
      install('toolchain-riscv32-esp');
      const result = await findCompiler(DEFAULT_TOOLCHAIN_PATTERNS, DEFAULT_COMPILER, home);
      expect(result.directory).to.equal(bin);
      expect(result.tried).to.deep.equal([DEFAULT_TOOLCHAIN_PATTERNS[0]]);
    });

    it('should skip a matching directory without the compiler', async () => {
      install('toolchain-riscv32-esp@14.2.0', false);
      const bin = install('toolchain-riscv32-esp');
      const result = await findCompiler(DEFAULT_TOOLCHAIN_PATTERNS, DEFAULT_COMPILER, home);
      expect(result.directory).to.equal(bin);
      expect(result.tried).to.deep.equal(DEFAULT_TOOLCHAIN_PATTERNS);
    });

    it('should prefer the highest release when a pattern matches several', async () => {
      install('toolchain-riscv32-esp@14.1.0');
      const bin = install('toolchain-riscv32-esp@14.2.0');
      const result = await findCompiler(DEFAULT_TOOLCHAIN_PATTERNS, DEFAULT_COMPILER, home);
      expect(result.directory).to.equal(bin);
    });

    it('should match source builds', async () => {
      const bin = install('toolchain-riscv32-esp@src-1234abcd');
      const result = await findCompiler(DEFAULT_TOOLCHAIN_PATTERNS, DEFAULT_COMPILER, home);
      expect(result.directory).to.equal(bin);
      expect(result.tried).to.deep.equal(DEFAULT_TOOLCHAIN_PATTERNS.slice(0, 2));
    });

    it('should report every pattern searched when nothing matches', async () => {
      install('toolchain-xtensa-esp32');
      const result = await findCompiler(DEFAULT_TOOLCHAIN_PATTERNS, DEFAULT_COMPILER, home);
      expect(result.directory).to.be.null;
      expect(result.tried).to.deep.equal(DEFAULT_TOOLCHAIN_PATTERNS);
    });

    it('should look for the compiler it is given', async () => {
      const bin = path.join(home, 'tools', 'gcc', 'bin');
      fs.mkdirSync(bin, { recursive: true });
      fs.writeFileSync(path.join(bin, 'xtensa-esp32-elf-gcc'), '');
      const result = await findCompiler(['~/tools/*/bin'], 'xtensa-esp32-elf-gcc', home);
      expect(result.directory).to.equal(bin);
    });
  });

  describe('listPackages', () => {
    it('should list the installed packages that mention riscv', async () => {
      install('toolchain-riscv32-esp@14.2.0');
      install('toolchain-riscv32-esp');
      install('tool-esptoolpy');
      install('framework-arduinoespressif32');
      expect(await listPackages(packages)).to.deep.equal([
        'toolchain-riscv32-esp',
        'toolchain-riscv32-esp@14.2.0',
      ]);
    });

    it('should list nothing when there is no packages directory', async () => {
      expect(await listPackages(path.join(home, 'missing'))).to.deep.equal([]);
    });
  });

  describe('expandHome', () => {
    it('should expand a leading tilde', () => {
      expect(expandHome('~/.platformio', '/home/dev')).to.equal(path.join('/home/dev', '.platformio'));
      expect(expandHome('~', '/home/dev')).to.equal('/home/dev');
    });

    it('should leave other paths alone', () => {
      expect(expandHome('/opt/~/bin', '/home/dev')).to.equal('/opt/~/bin');
    });
  });

  describe('prependPath', () => {
    it('should put the toolchain ahead of the existing PATH', () => {
      expect(prependPath('/tc/bin', ['/usr/bin', '/bin'].join(path.delimiter)))
        .to.equal(['/tc/bin', '/usr/bin', '/bin'].join(path.delimiter));
    });

    it('should use the directory alone for an empty PATH', () => {
      expect(prependPath('/tc/bin', '')).to.equal('/tc/bin');
    });
  });
});
