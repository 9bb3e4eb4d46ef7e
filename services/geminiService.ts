import { GoogleGenAI } from "@google/genai";
import type { MotorSettings, ProtectionSettings, StartingAssessment } from "../types";
import { formatTripTime, IDMT_CURVES } from "../utils/protectionCalculations";

const ai = new GoogleGenAI({ apiKey: process.env.API_KEY });

export const ASSESSMENT_FALLBACK = "Error retrieving AI assessment. Please ensure API key is configured.";

const yesNo = (ok: boolean) => (ok ? "Yes" : "NO (Critical)");

export const buildAssessmentPrompt = (
  motor: MotorSettings,
  settings: ProtectionSettings,
  start: StartingAssessment
): string => `
    Act as a Senior Power Systems Protection Engineer. Review the following induction motor protection settings.

    Motor Data:
    Rating: ${motor.motor.ratingKw} kW, ${motor.motor.voltageV} V, FLC: ${settings.fullLoadCurrentA} A
    Starting: ${start.startingCurrentA.toFixed(0)} A at ${settings.starting.voltagePct}% voltage, acceleration ${start.accelerationTimeS} s

    Protection Settings (primary amperes):
    - Thermal: pickup ${settings.thermal.pickupA.toFixed(0)} A, tau ${settings.thermal.timeConstantS} s, A2 ${settings.thermal.hotFactor}, K ${settings.thermal.npsWeighting}, I2 ${settings.thermal.unbalanceCurrentA.toFixed(1)} A
    - IDMT: ${IDMT_CURVES[settings.idmt.curve].label}, pickup ${settings.idmt.pickupA.toFixed(0)} A, TMS ${settings.idmt.tms}
    - Instantaneous OC: ${settings.instantaneousOc.pickupA.toFixed(0)} A
    - Definite-time OC: ${settings.definiteTimeOc.pickupA.toFixed(0)} A, ${settings.definiteTimeOc.delayS} s
    - Earth Fault: ${settings.earthFault.pickupA.toFixed(1)} A, ${settings.earthFault.delayS} s
    - NPS: ${settings.nps.pickupA.toFixed(1)} A, ${settings.nps.delayS} s
    - Locked Rotor: ${settings.lockedRotor.pickupA.toFixed(0)} A, max ${settings.lockedRotor.maxTimeS} s

    Trip times at starting current:
    - Thermal (cold): ${formatTripTime(start.thermalCold)} | clears start: ${yesNo(start.thermalColdClearsStart)}
    - Thermal (hot): ${formatTripTime(start.thermalHot)} | clears start: ${yesNo(start.thermalHotClearsStart)}
    - IDMT: ${formatTripTime(start.idmt)} | clears start: ${yesNo(start.idmtClearsStart)}
    - Locked rotor time above acceleration time: ${yesNo(start.lockedRotorClearsStart)}
    - Instantaneous OC above starting current: ${yesNo(start.instantaneousAboveStart)}

    Task:
    1. Provide a concise technical assessment of whether the motor can start without nuisance tripping.
    2. Comment on the hot-start thermal margin and the effect of the negative-sequence weighting.
    3. Flag any setting that looks inconsistent with the others.

    Keep it professional, engineering-focused, and under 200 words. Format with Markdown.
  `;

export const getProtectionAssessment = async (
  motor: MotorSettings,
  settings: ProtectionSettings,
  start: StartingAssessment
): Promise<string> => {
  const model = "gemini-2.5-flash";

  try {
    const response = await ai.models.generateContent({
      model: model,
      contents: buildAssessmentPrompt(motor, settings, start),
    });
    return response.text ?? "The assessment came back empty.";
  } catch (error) {
    console.error("Gemini API Error:", error);
    return ASSESSMENT_FALLBACK;
  }
};
