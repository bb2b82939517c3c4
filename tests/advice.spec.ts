import { describe, it, expect } from 'vitest';
import { assessRisk, recommend } from '../src/answering/advice.js';
import { reading, thresholds } from './helpers/fixtures.js';

describe('assessRisk', () => {
  it('reports the score against the danger threshold', () => {
    expect(assessRisk(reading(300, 's1', 10), thresholds)).toEqual({
      risk_score: 0.75,
      risk_level: 'safe',
      co2_ppm: 300,
      threshold: 400,
      message: 'CO2 levels are within safe range. No action required.',
      source: 's1',
      timestamp: 10,
    });
  });

  it('uses the hazardous message for critical readings', () => {
    const a = assessRisk(reading(650), thresholds);
    expect(a.risk_score).toBe(1);
    expect(a.risk_level).toBe('critical');
    expect(a.message).toBe('CRITICAL: CO2 is at hazardous levels. Evacuate if necessary.');
  });
});

describe('recommend', () => {
  it('picks the template for the reading severity', () => {
    const r = recommend(reading(520));
    expect(r.title).toBe('CRITICAL: Emergency Response Required');
    expect(r.urgency).toBe('critical');
    expect(r.actions).toHaveLength(7);
    expect(r.co2_context).toBe(520);
    expect(r.severity).toBe('critical');
  });

  it('hands out a copy of the action list', () => {
    const first = recommend(reading(360));
    expect(first.urgency).toBe('medium');
    first.actions.length = 0;
    expect(recommend(reading(360)).actions).toHaveLength(5);
  });
});
