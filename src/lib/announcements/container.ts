/**
 * @fileoverview Wires config, store, audit log, policy and service once per
 * process for the route handlers.
 * @module lib/announcements/container
 */
import { createAuthorizationPolicy } from '@/lib/announcements/authorization';
import { createRecordStore } from '@/lib/announcements/stores';
import { loadConfig, type AppConfig } from '@/lib/constants/config';
import { logger } from '@/lib/observability/logger';
import {
  createAnnouncementService,
  type AnnouncementService,
} from '@/services/announcements.service';
import { createAuditService } from '@/services/audit.service';

type Container = {
  config: AppConfig;
  announcements: AnnouncementService;
};

let container: Container | null = null;

function build(): Container {
  const config = loadConfig(process.env);
  const audit = createAuditService({ logFile: config.actionLogFile });
  const policy = createAuthorizationPolicy({ authorizedUsers: config.authorizedUsers, audit });
  const store = createRecordStore(config.store);

  logger.info(
    { store: store.id, authorizedUsers: config.authorizedUsers.size },
    'Announcement service ready',
  );

  return {
    config,
    announcements: createAnnouncementService({ store, policy, audit }),
  };
}

function getContainer(): Container {
  if (!container) container = build();
  return container;
}

export function getAppConfig(): AppConfig {
  return getContainer().config;
}

export function getAnnouncementService(): AnnouncementService {
  return getContainer().announcements;
}
