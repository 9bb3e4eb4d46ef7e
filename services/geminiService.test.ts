import { afterEach, describe, expect, it, vi } from 'vitest';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

import { ASSESSMENT_FALLBACK, buildAssessmentPrompt, getProtectionAssessment } from './geminiService';
import { assessStarting } from '../utils/curveSampler';
import { DEFAULT_MOTOR_SETTINGS, toProtectionSettings } from '../utils/settings';

const settings = toProtectionSettings(DEFAULT_MOTOR_SETTINGS);
const start = assessStarting(settings);

describe('buildAssessmentPrompt', () => {
  const prompt = buildAssessmentPrompt(DEFAULT_MOTOR_SETTINGS, settings, start);

  it('describes the motor and its start', () => {
    expect(prompt).toContain('Rating: 500 kW, 3300 V, FLC: 100 A');
    expect(prompt).toContain('Starting: 600 A at 100% voltage, acceleration 10 s');
  });

  it('lists the resolved settings', () => {
    expect(prompt).toContain('- IDMT: Normal Inverse, pickup 120 A, TMS 0.1');
    expect(prompt).toContain('- Earth Fault: 20.0 A, 0.5 s');
  });

  it('includes the starting check results', () => {
    expect(prompt).toContain('- Thermal (cold): 4.90 s | clears start: NO (Critical)');
    expect(prompt).toContain('- IDMT: 0.43 s | clears start: NO (Critical)');
    expect(prompt).toContain('- Instantaneous OC above starting current: Yes');
  });
});

describe('getProtectionAssessment', () => {
  afterEach(() => {
    generateContent.mockReset();
    vi.restoreAllMocks();
  });

  it('returns the model text', async () => {
    generateContent.mockResolvedValue({ text: 'Settings look reasonable.' });

    await expect(getProtectionAssessment(DEFAULT_MOTOR_SETTINGS, settings, start)).resolves.toBe('Settings look reasonable.');
    expect(generateContent).toHaveBeenCalledWith({
      model: 'gemini-2.5-flash',
      contents: buildAssessmentPrompt(DEFAULT_MOTOR_SETTINGS, settings, start),
    });
  });

  it('reports an empty response', async () => {
    generateContent.mockResolvedValue({ text: undefined });

    await expect(getProtectionAssessment(DEFAULT_MOTOR_SETTINGS, settings, start)).resolves.toBe('The assessment came back empty.');
  });

  it('falls back to a message when the request fails', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    generateContent.mockRejectedValue(new Error('API key not valid'));

    await expect(getProtectionAssessment(DEFAULT_MOTOR_SETTINGS, settings, start)).resolves.toBe(ASSESSMENT_FALLBACK);
    expect(errors).toHaveBeenCalledOnce();
  });
});
