export const runtime = 'nodejs';

/** GET /api/announcements/active → public dashboard view, no login needed. */

import { jsonError, jsonOk } from '@/lib/api/http';
import { getAnnouncementService } from '@/lib/announcements/container';
import { logger } from '@/lib/observability/logger';

export async function GET() {
  try {
    const items = await getAnnouncementService().activeAnnouncements(new Date());
    return jsonOk({ items });
  } catch (err: unknown) {
    logger.error({ err }, '[/api/announcements/active] unexpected');
    return jsonError(500, 'Internal error');
  }
}
