import { NextResponse } from 'next/server';
import { z } from 'zod';
import { analyzeOptionScenario } from '@/lib/actions/options.actions';
import { scenarioRequestSchema } from '@/lib/validation/options';

export async function POST(req: Request) {
  try {
    const json = await req.json();
    const payload = scenarioRequestSchema.parse(json);
    const data = await analyzeOptionScenario(payload);
    return NextResponse.json(data);
  } catch (error) {
    console.error('Option scenario error:', error);
    if (error instanceof z.ZodError) {
      return NextResponse.json(
        { error: 'Invalid payload', details: error.flatten() },
        { status: 400 }
      );
    }
    if (error instanceof SyntaxError) {
      return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
    }
    return NextResponse.json(
      { error: error instanceof Error ? error.message : 'Internal Server Error' },
      { status: 500 }
    );
  }
}
