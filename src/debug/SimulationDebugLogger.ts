/**
 * SimulationDebugLogger - Run-level logging for the simulation pipeline
 *
 * Disabled by default. When enabled, each analysis run captures its
 * configuration and a summary of every stage, so a run that misbehaves
 * can be replayed from its seed. Warnings are always printed.
 */

import type {
  DampingRegime,
  MSDCurve,
  MSDMode,
  RegimeReport,
  SimulationConfig,
  Trajectory,
  TrajectorySource,
} from "@/types";

/**
 * Debug log entry for a single analysis run.
 */
export interface SimulationDebugLog {
  timestamp: number;
  label: string;
  config?: ConfigDebugInfo;
  trajectory?: TrajectoryDebugInfo;
  curves: CurveDebugInfo[];
  fit?: FitDebugInfo;
  warnings: string[];
}

export interface ConfigDebugInfo {
  regime: DampingRegime;
  mass: number;
  radius: number;
  temperature: number;
  viscosity: number;
  dt: number;
  duration: number;
  steps: number;
  initialPosition: { x: number; y: number };
  stabilityFraction: number;
  seed: number | string | undefined;
  diffusionCoefficient: number;
  relaxationTime: number;
}

export interface TrajectoryDebugInfo {
  source: TrajectorySource;
  gridType: "regular" | "irregular";
  sampleCount: number;
  finalPosition: { x: number; y: number } | null;
}

export interface CurveDebugInfo {
  mode: MSDMode;
  pointCount: number;
  lastLag: number;
  lastMsd: number;
}

export interface FitDebugInfo {
  slope: number;
  intercept: number;
  rSquared: number;
  pointCount: number;
  regime: string;
}

class SimulationDebugLoggerImpl {
  private enabled = false;
  private logs: SimulationDebugLog[] = [];
  private maxLogs = 100;
  private lastLog: SimulationDebugLog | null = null;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[SIMULATION DEBUG] Logging enabled. Use SimulationDebugLogger.dump() to see logs.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[SIMULATION DEBUG] Logging disabled.");
  }

  /**
   * Toggle debug logging.
   */
  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new log entry. Later log* calls attach to it.
   */
  beginRun(label: string, config?: SimulationConfig): void {
    if (!this.enabled) return;

    const log: SimulationDebugLog = {
      timestamp: Date.now(),
      label,
      config: config ? this.configToDebugInfo(config) : undefined,
      curves: [],
      warnings: [],
    };

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    console.log(`[SIMULATION DEBUG] Run #${this.logs.length} started: ${label}`);
  }

  logTrajectory(trajectory: Trajectory): void {
    if (!this.enabled || !this.lastLog) return;

    const last = trajectory.samples[trajectory.samples.length - 1];
    this.lastLog.trajectory = {
      source: trajectory.source,
      gridType: trajectory.grid.type,
      sampleCount: trajectory.samples.length,
      finalPosition: last ? { ...last.position } : null,
    };
  }

  logCurve(curve: MSDCurve): void {
    if (!this.enabled || !this.lastLog) return;

    const last = curve.points[curve.points.length - 1];
    this.lastLog.curves.push({
      mode: curve.mode,
      pointCount: curve.points.length,
      lastLag: last?.lag ?? 0,
      lastMsd: last?.msd ?? 0,
    });
  }

  logFit(report: RegimeReport): void {
    if (!this.enabled || !this.lastLog) return;

    this.lastLog.fit = {
      slope: report.slope,
      intercept: report.intercept,
      rSquared: report.rSquared,
      pointCount: report.pointCount,
      regime: report.regime,
    };
  }

  /**
   * Report a condition that does not stop the run.
   * Printed even when logging is disabled.
   */
  warn(message: string): void {
    console.warn(`[SIMULATION WARNING] ${message}`);
    if (this.enabled && this.lastLog) {
      this.lastLog.warnings.push(message);
    }
  }

  private configToDebugInfo(config: SimulationConfig): ConfigDebugInfo {
    return {
      regime: config.regime,
      mass: config.physical.mass,
      radius: config.physical.radius,
      temperature: config.physical.temperature,
      viscosity: config.physical.viscosity,
      dt: config.grid.dt,
      duration: config.grid.duration,
      steps: config.grid.steps,
      initialPosition: { ...config.initialPosition },
      stabilityFraction: config.stabilityFraction,
      seed: config.seed,
      diffusionCoefficient: config.derived.diffusionCoefficient,
      relaxationTime: config.derived.relaxationTime,
    };
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[SIMULATION DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`${log.label} @ ${new Date(log.timestamp).toISOString()}`);
      if (log.config) {
        console.log("Config:", log.config);
      }
      if (log.trajectory) {
        console.log("Trajectory:", log.trajectory);
      }
      for (const curve of log.curves) {
        console.log("Curve:", curve);
      }
      if (log.fit) {
        console.log("Fit:", log.fit);
      }
      if (log.warnings.length > 0) {
        console.log("Warnings:", log.warnings);
      }
      console.groupEnd();
    }
  }

  getLastLog(): SimulationDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly SimulationDebugLog[] {
    return this.logs;
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs = [];
    this.lastLog = null;
  }

  /**
   * Export the last run's configuration as a SimulationOptions literal,
   * for turning a logged run into a reproducible test case.
   */
  exportAsOptions(): string {
    const config = this.lastLog?.config;
    if (!config) {
      return "// No simulation run logged";
    }

    const seed =
      config.seed === undefined
        ? "  // unseeded run: results will differ on replay\n"
        : `  seed: ${JSON.stringify(config.seed)},\n`;

    return `const options: SimulationOptions = {
  mass: ${config.mass},
  radius: ${config.radius},
  dt: ${config.dt},
  duration: ${config.duration},
  regime: "${config.regime}",
  temperature: ${config.temperature},
  viscosity: ${config.viscosity},
  initialPosition: { x: ${config.initialPosition.x}, y: ${config.initialPosition.y} },
  stabilityFraction: ${config.stabilityFraction},
${seed}};`;
  }
}

/**
 * Global debug logger instance.
 */
export const SimulationDebugLogger = new SimulationDebugLoggerImpl();
