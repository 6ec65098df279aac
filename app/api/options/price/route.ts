import { NextResponse } from 'next/server';
import { z } from 'zod';
import { priceOptionContract } from '@/lib/actions/options.actions';
import { optionParametersSchema } from '@/lib/validation/options';

export async function POST(req: Request) {
  try {
    const json = await req.json();
    const payload = optionParametersSchema.parse(json);
    const data = await priceOptionContract(payload);
    return NextResponse.json(data);
  } catch (error) {
    console.error('Option pricing error:', error);
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
