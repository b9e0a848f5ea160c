import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { CONFIG } from '@/lib/config';
import { errorMessage, isAbortError } from '@/lib/errors';
import { createOccurrenceSearcher } from '@/lib/occurrence-search';
import { isValidOffset } from '@/lib/pagination';
import { createSearchContext } from '@/lib/search-context';
import { fetchOccurrencePage, validatePageParameters } from '@/lib/search-pipeline';

const pageRequestSchema = z.object({
  parameters: z.unknown(),
  offset: z.number().refine(isValidOffset, 'Offset must be a non-negative multiple of the page size'),
});

export async function POST(req: NextRequest) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
  }

  const parsed = pageRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.issues[0].message }, { status: 400 });
  }

  const parameters = validatePageParameters(parsed.data.parameters, CONFIG.gbif.institutionKey);
  if (!parameters.success) {
    return NextResponse.json({ error: errorMessage(parameters.error) }, { status: 400 });
  }

  const ctx = createSearchContext(req.signal);
  console.log(`🌍 GBIF OCCURRENCES API called [${ctx.requestId}] at offset ${parsed.data.offset}`);

  try {
    const outcome = await fetchOccurrencePage(parameters.data, parsed.data.offset, ctx, {
      searcher: createOccurrenceSearcher(),
      institutionKey: CONFIG.gbif.institutionKey,
    });
    return NextResponse.json(outcome, {
      status: outcome.status === 'ok' ? 200 : outcome.httpStatus >= 400 ? outcome.httpStatus : 502,
    });
  } catch (error) {
    if (isAbortError(error) || req.signal.aborted) {
      return new NextResponse(null, { status: 499 });
    }
    console.error(`❌ [${ctx.requestId}] GBIF occurrences error:`, error);
    return NextResponse.json({ error: 'Failed to fetch from GBIF API' }, { status: 500 });
  }
}
