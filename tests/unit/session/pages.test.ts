import { describe, it, expect } from 'vitest';

import {
  isPage,
  LOGGED_OUT,
  pagesFor,
  reachablePages,
  reachablePagesForRole,
  resolveHomePage,
  resolvePage,
} from '@/modules/session/index.js';

describe('role pages', () => {
  it('gives each role its menu', () => {
    expect(reachablePages('Investor')).toEqual(['Investor']);
    expect(reachablePages('Researcher')).toEqual(['Researcher', 'Home']);
    expect(reachablePages('Administrator')).toEqual(['Admin', 'Home']);
  });

  it('falls back to Home for an unknown stored role', () => {
    expect(reachablePagesForRole('Auditor')).toEqual(['Home']);
  });

  it('shows no pages while logged out', () => {
    expect(pagesFor(LOGGED_OUT)).toEqual([]);
    expect(
      pagesFor({ status: 'logged-in', userId: 3, username: 'ana', role: 'Investor' })
    ).toEqual(['Investor']);
  });

  it('resolves Home to the role dashboard', () => {
    expect(resolveHomePage('Administrator')).toBe('Admin');
    expect(resolveHomePage('Researcher')).toBe('Researcher');
    expect(resolveHomePage('Auditor')).toBe('Investor');
    expect(resolvePage('Researcher', 'Home')).toBe('Researcher');
    expect(resolvePage('Auditor', 'Home')).toBe('Investor');
  });

  it('refuses pages outside the role menu', () => {
    expect(resolvePage('Investor', 'Home')).toBeNull();
    expect(resolvePage('Investor', 'Researcher')).toBeNull();
    expect(resolvePage('Researcher', 'Admin')).toBeNull();
    expect(resolvePage('Administrator', 'Investor')).toBeNull();
  });

  it('recognises page names exactly', () => {
    expect(isPage('Admin')).toBe(true);
    expect(isPage('admin')).toBe(false);
  });
});
