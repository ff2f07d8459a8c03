/**
 * Mock page state
 *
 * Hardcoded floor plan standing in for real measurement storage:
 * 1 zone at 1:100, 3 conditions (window, door, wall), 5 items.
 */

import { readFileSync } from 'node:fs'
import { PageConditionsStateSchema } from '@takeoff-link/shared'
import type { PageConditionsState } from '@takeoff-link/shared'

const MOCK_PAGE_STATE_FILE = new URL('../data/mock-page-state.json', import.meta.url)

let cached: PageConditionsState | null = null

function loadMockPageState(): PageConditionsState {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(MOCK_PAGE_STATE_FILE, 'utf8'))
    cached = PageConditionsStateSchema.parse(raw)
  }
  return cached
}

/**
 * Page state for a document page. Every document and page currently
 * returns the same floor plan; callers get their own copy.
 */
export function getMockPageState(documentId: string, pageNumber: number): PageConditionsState {
  console.log(`[MockData] Serving mock floor plan for documentId=${documentId}, pageNumber=${pageNumber}`)
  return structuredClone(loadMockPageState())
}
