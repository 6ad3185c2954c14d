/**
 * Get Page Use Case
 *
 * Checks that the session may open a page, then builds its model from the
 * current snapshot.
 */

import { err, ok, type Result } from 'neverthrow';

import { buildFullDashboard, buildInvestorDashboard, summarizeSources } from '../page-models.js';

import type { MineralDataRepository } from '../../../mineral-data/core/ports.js';
import type { AdminOperationError, PageAccessError } from '../../../session/core/errors.js';
import type { Page } from '../../../session/core/types.js';
import type { PageViewer } from '../ports.js';
import type { AdminDashboard, PageModel, PageQuery, ResearcherDashboard } from '../types.js';

export interface GetPageDeps {
  dataRepository: MineralDataRepository;
}

export type GetPageError = PageAccessError | AdminOperationError;

export async function getPage(
  deps: GetPageDeps,
  viewer: PageViewer,
  page: Page,
  query: PageQuery = {}
): Promise<Result<PageModel, GetPageError>> {
  const opened = viewer.openPage(page);
  if (opened.isErr()) {
    return err(opened.error);
  }

  const snapshot = await deps.dataRepository.load();

  switch (opened.value) {
    case 'Investor':
      return ok(buildInvestorDashboard(snapshot, query));

    case 'Researcher': {
      const model: ResearcherDashboard = {
        page: 'Researcher',
        ...buildFullDashboard(snapshot, query),
      };
      return ok(model);
    }

    case 'Admin': {
      const users = await viewer.listUsers();
      if (users.isErr()) {
        return err(users.error);
      }
      const model: AdminDashboard = {
        page: 'Admin',
        ...buildFullDashboard(snapshot, query),
        users: users.value,
        sources: summarizeSources(snapshot),
      };
      return ok(model);
    }
  }
}
