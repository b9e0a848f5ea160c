import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { CONFIG, validateConfig } from '@/lib/config';
import { errorMessage, isAbortError } from '@/lib/errors';
import { createSearchContext } from '@/lib/search-context';
import { createSearchPipelineDependencies, runSearchPipeline, type SearchOutcome } from '@/lib/search-pipeline';

const searchRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required').max(CONFIG.search.maxQueryLength, 'Query is too long'),
  institutionCode: z.string().max(50).optional(),
  collectionCode: z.string().max(50).optional(),
});

function statusFor(outcome: SearchOutcome): number {
  switch (outcome.status) {
    case 'ok':
      return 200;
    case 'translation-failed':
      return 422;
    case 'search-failed':
      return outcome.httpStatus >= 400 ? outcome.httpStatus : 502;
  }
}

export async function POST(request: NextRequest) {
  try {
    validateConfig();
  } catch (error) {
    console.error('❌ Search service is misconfigured:', errorMessage(error));
    return NextResponse.json(
      { error: 'The search service is not configured. Please contact the site administrator.' },
      { status: 500 },
    );
  }

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
  }

  const parsed = searchRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.issues[0].message }, { status: 400 });
  }

  const ctx = createSearchContext(request.signal);
  console.log(`🎯 SEARCH API TRIGGERED [${ctx.requestId}] - Query: "${parsed.data.query}"`);

  try {
    const outcome = await runSearchPipeline(parsed.data, ctx, createSearchPipelineDependencies());
    return NextResponse.json(outcome, { status: statusFor(outcome) });
  } catch (error) {
    if (isAbortError(error) || request.signal.aborted) {
      console.log(`🚫 [${ctx.requestId}] Search cancelled by the client`);
      return new NextResponse(null, { status: 499 });
    }
    console.error(`❌ [${ctx.requestId}] Search API error:`, error);
    return NextResponse.json({ error: 'Sorry, something went wrong. Please try again.' }, { status: 500 });
  }
}
