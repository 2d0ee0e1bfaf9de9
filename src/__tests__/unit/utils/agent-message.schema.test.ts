import {
  decodeMessage,
  encodeMessage,
  isAgentMessageType,
  parseMessageBody,
} from '../../../utils/zod-schemas/agent-message.schema';

function decode(body: string) {
  const parsed = parseMessageBody(body);
  if (!parsed.ok) throw new Error(parsed.reason);
  return decodeMessage(parsed.payload);
}

describe('agent message schema', () => {
  it('decodes student_risk with defaults for optional keys and ignores unknown keys', () => {
    const result = decode(JSON.stringify({ type: 'student_risk', student_id: 7, score: 30, severity: 'warning', extra: 1 }));
    expect(result).toEqual({
      ok: true,
      message: {
        type: 'student_risk',
        studentId: '7',
        studentName: '',
        score: 30,
        recentScore: null,
        severity: 'warning',
      },
    });
  });

  it('reports missing required fields as invalid with issue paths', () => {
    const result = decode(JSON.stringify({ type: 'create_alert', student_id: 'a1', severity: 'danger' }));
    expect(result.ok).toBe(false);
    if (result.ok || result.kind !== 'invalid') throw new Error('expected invalid');
    expect(result.type).toBe('create_alert');
    expect(result.issues).toEqual(['score: Required']);
  });

  it('rejects a severity outside the two levels', () => {
    const result = decode(JSON.stringify({ type: 'student_risk', student_id: 1, score: 10, severity: 'critical' }));
    expect(result).toMatchObject({ ok: false, kind: 'invalid', type: 'student_risk' });
  });

  it('treats unknown and missing types as unknown_type', () => {
    expect(decode(JSON.stringify({ type: 'weather_report' }))).toEqual({
      ok: false,
      kind: 'unknown_type',
      type: 'weather_report',
    });
    expect(decode(JSON.stringify({ student_id: 1 }))).toEqual({ ok: false, kind: 'unknown_type', type: null });
  });

  it('clamps suggested difficulty into 1..3', () => {
    const result = decode(JSON.stringify({ type: 'adaptation_analysis', suggested_difficulty: 5 }));
    expect(result).toEqual({
      ok: true,
      message: {
        type: 'adaptation_analysis',
        studentId: null,
        suggestedDifficulty: 3,
        summary: null,
        weakAreas: [],
      },
    });
  });

  it('only accepts JSON objects as bodies', () => {
    expect(parseMessageBody('not json').ok).toBe(false);
    expect(parseMessageBody('[1,2]')).toEqual({ ok: false, reason: 'body is not a JSON object' });
    expect(parseMessageBody('"text"')).toEqual({ ok: false, reason: 'body is not a JSON object' });
  });

  it('encodes camelCase messages as snake_case wire payloads', () => {
    const body = encodeMessage({ type: 'recommendations_ready', studentId: '3', recommendationsCount: 2, aiUsed: false });
    expect(JSON.parse(body)).toEqual({
      type: 'recommendations_ready',
      student_id: '3',
      recommendations_count: 2,
      ai_used: false,
    });
  });

  it('knows the closed set of message types', () => {
    expect(isAgentMessageType('analyze_errors')).toBe(true);
    expect(isAgentMessageType('chat_answer')).toBe(false);
  });
});
