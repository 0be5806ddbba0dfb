import { readSnapshot } from '../SignalSource';
import { StaticSignalSource } from '../StaticSignalSource';
import { DatarefSignalSource, XPLANE_DATAREFS } from '../datarefs';

describe('readSnapshot', () => {
  it('reads every signal once into a frozen snapshot', () => {
    const source = new StaticSignalSource({
      onGround: 1,
      engineRunning: 1,
      groundSpeed: 12.5,
      indicatedAirspeed: 24,
      verticalSpeed: -1.5,
      radioAltitude: 3,
      altitudeAgl: 0.8,
      flightTime: 42,
      heading: 271.5,
      distance: 950,
      fuelQuantity: [1000, 800.5],
      latitude: 51.5,
      longitude: -0.12,
      elevation: 25,
    });

    const snapshot = readSnapshot(source, { fuelTankCount: 2 });

    expect(snapshot).toEqual({
      onGround: true,
      engineRunning: true,
      paused: false,
      groundSpeedMs: 12.5,
      indicatedAirspeedKt: 24,
      verticalSpeedMs: -1.5,
      radioAltitudeFt: 3,
      altitudeAglM: 0.8,
      flightTimeSec: 42,
      headingDeg: 271.5,
      distanceM: 950,
      fuelTanks: [1000, 800.5],
      fuelTotal: 1800.5,
      latitude: 51.5,
      longitude: -0.12,
      elevationM: 25,
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.fuelTanks)).toBe(true);
  });

  it('turns missing and non-finite readings into zero', () => {
    const source = new StaticSignalSource({
      paused: Number.NaN,
      groundSpeed: Number.POSITIVE_INFINITY,
      fuelQuantity: [100, Number.NaN, 250],
    });

    const snapshot = readSnapshot(source, { fuelTankCount: 4 });

    expect(snapshot.paused).toBe(false);
    expect(snapshot.onGround).toBe(false);
    expect(snapshot.groundSpeedMs).toBe(0);
    expect(snapshot.latitude).toBe(0);
    expect(snapshot.fuelTanks).toEqual([100, 0, 250, 0]);
    expect(snapshot.fuelTotal).toBe(350);
  });

  it('reads flags as set from one half upwards', () => {
    const snapshot = readSnapshot(
      new StaticSignalSource({ onGround: 0.5, engineRunning: 0.49 }),
      { fuelTankCount: 1 },
    );
    expect(snapshot.onGround).toBe(true);
    expect(snapshot.engineRunning).toBe(false);
  });
});

describe('StaticSignalSource', () => {
  it('serves scalars at index 0 only', () => {
    const source = new StaticSignalSource({ heading: 90 });
    expect(source.read('heading')).toBe(90);
    expect(source.read('heading', 1)).toBeUndefined();
  });

  it('merges on set and starts over on replace', () => {
    const source = new StaticSignalSource({ heading: 90, latitude: 10 });
    source.set({ heading: 180 });
    expect(source.read('heading')).toBe(180);
    expect(source.read('latitude')).toBe(10);

    source.replace({ longitude: 5 });
    expect(source.read('latitude')).toBeUndefined();
    expect(source.read('longitude')).toBe(5);
  });
});

describe('DatarefSignalSource', () => {
  it('reads the mapped dataref with the requested index', () => {
    const reader = jest.fn((dataref: string, index: number): unknown => (
      dataref === XPLANE_DATAREFS.fuelQuantity ? [300, 200][index] : 1
    ));
    const source = new DatarefSignalSource(reader);

    expect(source.read('fuelQuantity', 1)).toBe(200);
    expect(reader).toHaveBeenCalledWith('sim/cockpit2/fuel/fuel_quantity', 1);

    source.read('groundSpeed');
    expect(reader).toHaveBeenLastCalledWith('sim/flightmodel/position/groundspeed', 0);
  });

  it('maps booleans to flags and drops non-numeric values', () => {
    const values: Record<string, unknown> = {
      [XPLANE_DATAREFS.onGround]: true,
      [XPLANE_DATAREFS.paused]: false,
      [XPLANE_DATAREFS.heading]: 'north',
    };
    const source = new DatarefSignalSource((dataref) => values[dataref]);

    expect(source.read('onGround')).toBe(1);
    expect(source.read('paused')).toBe(0);
    expect(source.read('heading')).toBeUndefined();
    expect(source.read('latitude')).toBeUndefined();
  });
});
