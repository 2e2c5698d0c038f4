import { NextResponse } from 'next/server';
import {
  InvalidInputError,
  NotFoundError,
  isPlannerError,
  type PlannerErrorCode,
} from '@prereq-planner/planner';

const STATUS_BY_CODE: Record<PlannerErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_INPUT: 400,
  UPSTREAM_UNAVAILABLE: 503,
};

export function errorResponse(error: unknown): NextResponse {
  if (error instanceof NotFoundError) {
    return NextResponse.json(
      { error: error.message, code: error.code, missing: error.missing },
      { status: STATUS_BY_CODE.NOT_FOUND }
    );
  }

  if (error instanceof InvalidInputError) {
    return NextResponse.json(
      { error: error.message, code: error.code, field: error.field },
      { status: STATUS_BY_CODE.INVALID_INPUT }
    );
  }

  if (isPlannerError(error)) {
    return NextResponse.json({ error: error.message, code: error.code }, { status: STATUS_BY_CODE[error.code] });
  }

  console.error('❌ Unhandled API error:', error);
  return NextResponse.json({ error: 'Internal server error', code: 'INTERNAL' }, { status: 500 });
}

/** Run a planner call and serialize its result or its failure. */
export async function respond<T>(work: () => Promise<T>): Promise<NextResponse> {
  try {
    return NextResponse.json(await work());
  } catch (error) {
    return errorResponse(error);
  }
}
