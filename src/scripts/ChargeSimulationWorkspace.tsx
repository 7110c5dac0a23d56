import React, { useRef, useEffect, useState, useCallback } from 'react';
import { DEFAULT_PRESET, loadPreset } from '../presets/presets';
import type { PresetId } from '../presets/presets';
import { ChargeSimulation } from '../simulation/ChargeSimulation';
import type { SimulationSnapshot } from '../simulation/ChargeSimulation';
import { SimulationError } from '../simulation/errors';
import { SimulationLoop } from '../simulation/SimulationLoop';
import ControlPanel from '../views/ControlPanel';
import { ParticleMeshManager } from '../views/ParticleMeshManager';
import { SceneManager } from '../views/SceneManager';
import { TrailMeshManager } from '../views/TrailMeshManager';

// Keeps per-frame trail rebuilds affordable on long runs
const MAX_TRAIL_POINTS = 5000;

interface PanelStatus {
  running: boolean;
  dt: number;
  stepCount: number;
  elapsedTime: number;
  activeCount: number;
  particleCount: number;
}

function statusFromSnapshot(snapshot: SimulationSnapshot): PanelStatus {
  return {
    running: snapshot.running,
    dt: snapshot.dt,
    stepCount: snapshot.stepCount,
    elapsedTime: snapshot.elapsedTime,
    activeCount: snapshot.particles.filter((p) => p.active).length,
    particleCount: snapshot.particles.length,
  };
}

const ChargeSimulationWorkspace: React.FC = () => {
  const containerRef = useRef<HTMLDivElement>(null);
  const simulationRef = useRef<ChargeSimulation | null>(null);

  const [presetId, setPresetId] = useState<PresetId>(DEFAULT_PRESET);
  const [status, setStatus] = useState<PanelStatus | null>(null);
  const [errorMessage, setErrorMessage] = useState<string | null>(null);

  // Control errors from bad input are shown in the panel; anything else propagates
  const runControl = useCallback((action: (simulation: ChargeSimulation) => void): boolean => {
    const simulation = simulationRef.current;
    if (!simulation) return false;
    try {
      action(simulation);
    } catch (error) {
      if (error instanceof SimulationError) {
        console.error('Simulation control rejected:', error.message);
        setErrorMessage(error.message);
        return false;
      }
      throw error;
    }
    setErrorMessage(null);
    setStatus(statusFromSnapshot(simulation.getSnapshot()));
    return true;
  }, []);

  const changePreset = useCallback(
    (nextPreset: PresetId) => {
      if (runControl((simulation) => simulation.reset(loadPreset(nextPreset)))) {
        setPresetId(nextPreset);
      }
    },
    [runControl],
  );

  const changeDt = useCallback(
    (dt: number) => {
      runControl((simulation) => simulation.setDt(dt));
    },
    [runControl],
  );

  const togglePause = useCallback(() => {
    runControl((simulation) => {
      simulation.togglePause();
    });
  }, [runControl]);

  const resetSimulation = useCallback(() => {
    runControl((simulation) => {
      simulation.reset();
    });
  }, [runControl]);

  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    const simulation = new ChargeSimulation(loadPreset(DEFAULT_PRESET), {
      maxTrajectoryLength: MAX_TRAIL_POINTS,
    });
    simulationRef.current = simulation;

    const sceneManager = new SceneManager();
    if (!container.contains(sceneManager.renderer.domElement)) {
      container.appendChild(sceneManager.renderer.domElement);
    }
    sceneManager.initializeControls(sceneManager.renderer.domElement);

    const particleMeshManager = new ParticleMeshManager(sceneManager.scene);
    const trailMeshManager = new TrailMeshManager(sceneManager.scene);

    const renderSnapshot = (snapshot: SimulationSnapshot) => {
      particleMeshManager.updateParticles(snapshot.particles);
      trailMeshManager.updateTrails(snapshot.particles);
      sceneManager.render();
      setStatus(statusFromSnapshot(snapshot));
    };

    const onResize = () => {
      const width = container.clientWidth || window.innerWidth;
      const height = container.clientHeight || window.innerHeight;
      sceneManager.resize(width, height);
    };

    onResize();
    window.addEventListener('resize', onResize);

    renderSnapshot(simulation.getSnapshot());
    const loop = new SimulationLoop(simulation, renderSnapshot);
    loop.start();

    return () => {
      loop.stop();
      simulationRef.current = null;
      window.removeEventListener('resize', onResize);

      if (container.contains(sceneManager.renderer.domElement)) {
        container.removeChild(sceneManager.renderer.domElement);
      }

      trailMeshManager.dispose();
      particleMeshManager.dispose();
      sceneManager.dispose();
    };
  }, []);

  return (
    <div style={{ position: 'relative', width: '100vw', height: '100vh' }}>
      <div
        ref={containerRef}
        style={{ width: '100%', height: '100%', background: '#070724' }}
      />

      {status && (
        <ControlPanel
          selectedPreset={presetId}
          dt={status.dt}
          running={status.running}
          stepCount={status.stepCount}
          elapsedTime={status.elapsedTime}
          activeCount={status.activeCount}
          particleCount={status.particleCount}
          errorMessage={errorMessage}
          onPresetChange={changePreset}
          onDtChange={changeDt}
          onTogglePause={togglePause}
          onReset={resetSimulation}
        />
      )}
    </div>
  );
};

export default ChargeSimulationWorkspace;
