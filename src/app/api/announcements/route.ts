export const runtime = 'nodejs';

/**
 * GET  /api/announcements  → staff listing (admin: all, authorized users: own)
 * POST /api/announcements  → create, answers 201 { id }
 */

import { announcementErrorResponse, jsonError, jsonOk, readJsonObject } from '@/lib/api/http';
import { getAnnouncementService, getAppConfig } from '@/lib/announcements/container';
import { remoteAddress, resolveCaller } from '@/lib/auth/identity';
import { logger } from '@/lib/observability/logger';

export async function GET(req: Request) {
  try {
    const caller = await resolveCaller(req, getAppConfig().identity);
    const result = await getAnnouncementService().listAnnouncements(caller, {
      remoteAddress: remoteAddress(req),
    });

    if (!result.ok) return announcementErrorResponse(result.error);
    return jsonOk({ items: result.data });
  } catch (err: unknown) {
    logger.error({ err }, '[/api/announcements] unexpected');
    return jsonError(500, 'Internal error');
  }
}

export async function POST(req: Request) {
  try {
    const caller = await resolveCaller(req, getAppConfig().identity);
    const body = await readJsonObject(req);

    const result = await getAnnouncementService().createAnnouncement(caller, body ?? {}, {
      remoteAddress: remoteAddress(req),
    });

    if (!result.ok) return announcementErrorResponse(result.error);
    return jsonOk({ id: result.data }, 201);
  } catch (err: unknown) {
    logger.error({ err }, '[/api/announcements] unexpected');
    return jsonError(500, 'Internal error');
  }
}
