/**
 * QKD Telemetry - Kernel: Optical Components
 *
 * Light source and polarization detector array owned by a node.
 * Parameters are public and mutable; faults write them directly.
 */

// ============================================
// LIGHT SOURCE
// ============================================

export class LightSource {
  readonly name: string;
  /** Pulse repetition rate (Hz) */
  frequency = 1e6;
  /** Mean photon number per pulse (mu) */
  meanPhotonNum = 0.1;
  /** Probability that a prepared state carries a phase flip */
  phaseError = 0;

  constructor(name: string) {
    this.name = name;
  }
}

// ============================================
// DETECTORS
// ============================================

export class Detector {
  /** Quantum efficiency, 0-1 */
  efficiency = 0.9;
  /** Dark counts per second */
  darkCountRate = 0;
  /** Gating window (ps) */
  timeResolution = 150;
}

export interface DetectorSettings {
  efficiency?: number;
  darkCountRate?: number;
  timeResolution?: number;
}

export type DetectorParameters = Required<DetectorSettings>;

/** Polarization detector array: one detector per basis outcome */
export class QSDetectorPolarization {
  readonly name: string;
  readonly detectors: Detector[];
  /** Geiger-mode parameters captured when the array was blinded */
  private geigerMode: DetectorParameters[] | null = null;

  constructor(name: string, detectorCount = 2) {
    this.name = name;
    this.detectors = Array.from({ length: detectorCount }, () => new Detector());
  }

  setDetector(index: number, settings: DetectorSettings): void {
    const detector = this.detectors[index];
    if (!detector) return;
    if (settings.efficiency !== undefined) detector.efficiency = settings.efficiency;
    if (settings.darkCountRate !== undefined) detector.darkCountRate = settings.darkCountRate;
    if (settings.timeResolution !== undefined) detector.timeResolution = settings.timeResolution;
  }

  /** Apply the same settings to every detector */
  setAll(settings: DetectorSettings): void {
    this.detectors.forEach((_, index) => this.setDetector(index, settings));
  }

  get isBlinded(): boolean {
    return this.geigerMode !== null;
  }

  /**
   * Force the array out of Geiger mode. The reported parameters take the
   * saturated settings, while clicks follow whatever the attacker injects,
   * which mimics the statistics of the detectors before blinding.
   */
  blind(settings: DetectorSettings): void {
    if (!this.geigerMode) {
      this.geigerMode = this.detectors.map(d => ({
        efficiency: d.efficiency,
        darkCountRate: d.darkCountRate,
        timeResolution: d.timeResolution,
      }));
    }
    this.setAll(settings);
  }

  /** Parameters that decide which pulses produce clicks */
  clickModel(): readonly DetectorParameters[] {
    return this.geigerMode ?? this.detectors;
  }
}
