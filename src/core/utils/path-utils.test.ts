import { describe, it, expect } from 'vitest';
import { resolveEventPath, toAbs, resolveCommand } from './path-utils.js';

describe('Path Utilities', () => {
  describe('resolveEventPath', () => {
    it('should join directory and filename', () => {
      expect(resolveEventPath('/data', 'a.fits')).toBe('/data/a.fits');
    });

    it('should give the same path with or without a trailing separator', () => {
      expect(resolveEventPath('/data/', 'a.fits')).toBe(resolveEventPath('/data', 'a.fits'));
      expect(resolveEventPath('/data//', 'a.fits')).toBe('/data/a.fits');
    });

    it('should keep alternate-stream suffixes in the filename', () => {
      expect(resolveEventPath('/data', 'cube001.fits:Zone.Identifier')).toBe('/data/cube001.fits:Zone.Identifier');
    });

    it('should handle filenames with spaces', () => {
      expect(resolveEventPath('/data/raw', 'night 1.fits')).toBe('/data/raw/night 1.fits');
    });
  });

  describe('toAbs', () => {
    it('should resolve relative paths against the base', () => {
      expect(toAbs('raw_data', '/home/user/automation')).toBe('/home/user/automation/raw_data');
    });

    it('should normalize absolute paths', () => {
      expect(toAbs('/data/raw/', '/elsewhere')).toBe('/data/raw/');
      expect(toAbs('/data/./raw', '/elsewhere')).toBe('/data/raw');
    });
  });

  describe('resolveCommand', () => {
    it('should leave bare command names for PATH lookup', () => {
      expect(resolveCommand('reduce-cube', '/home/user/automation')).toBe('reduce-cube');
      expect(resolveCommand('python3', '/home/user/automation')).toBe('python3');
    });

    it('should resolve relative paths against the base', () => {
      expect(resolveCommand('./automate.py', '/home/user/automation')).toBe('/home/user/automation/automate.py');
      expect(resolveCommand('venv/bin/python', '/home/user/automation')).toBe('/home/user/automation/venv/bin/python');
    });

    it('should keep absolute paths', () => {
      expect(resolveCommand('/opt/automation/automate.py', '/elsewhere')).toBe('/opt/automation/automate.py');
    });
  });
});
