// Shared fixtures for the test suites.

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Section } from "../src/types.js";

export const FIXTURES_BASE = join(import.meta.dirname, "fixtures");

/** Write files under fixtures/<name>, replacing anything already there. */
export function setupFixture(name: string, files: Record<string, string> = {}): string {
  const dir = join(FIXTURES_BASE, name);
  rmSync(dir, { recursive: true, force: true });
  mkdirSync(dir, { recursive: true });
  for (const [path, content] of Object.entries(files)) {
    const fullPath = join(dir, path);
    mkdirSync(join(fullPath, ".."), { recursive: true });
    writeFileSync(fullPath, content);
  }
  return dir;
}

export function cleanupFixture(name: string): void {
  rmSync(join(FIXTURES_BASE, name), { recursive: true, force: true });
}

export function section(id: string, content: string, title = id): Section {
  return { id, title, level: 2, content, lineStart: 1, lineEnd: 1 };
}

export const SAMPLE_DECK = `---
version: 1.0.0
created: 2024-01-01
updated: 2024-01-01
type: pitch-deck
---

## Company Purpose

Acme Stays connects travelers with local hosts for short stays. We MUST keep every booking simple and transparent for guests and hosts alike.

## Problem

Travelers overpay for hotels and hosts lack a simple way to reach guests. Existing platforms charge high fees and hide total prices until checkout.

## Solution

SAVE MONEY on every trip. Our platform is cheaper than hotels and handles payments and reviews in one place.

## Why Now

Remote work has made longer stays common, and mobile payments are now trusted by most travelers around the world today.

## Market Potential

The short-stay market serves 50,000 customers in our launch region, with 2 billion revenue across the wider travel market each year.

## Competition

Large listing sites dominate but charge hosts up to 15% fees. We win on lower fees and faster payouts for small hosts.

## Product

- User registration
- Listing management
- Booking system

## Business Model

We charge a 10% commission on each booking. Average booking value is $150 and hosts are paid within two days.

## Team

Two founders with eight years of combined experience building travel marketplaces and payment systems for small businesses.

## Financials

We project 1,000,000 in revenue by year two and are raising a seed round to fund growth and hiring.
`;
