import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  ReferenceLine,
} from 'recharts';
import type { FireExposureResult, VesselGeometry } from '../../engine/schema/SizingInputV1';
import { buildVessel, vesselRadiusAt } from '../../engine/modules/GeometrySolverModule';

export interface ProfilePoint {
  heightM: number;
  leftM: number;
  rightM: number;
}

/**
 * Sample the inner vessel profile bottom-to-top for plotting.
 * Heights are measured from the bottom apex, as in FireExposureResult.
 */
export function buildVesselProfile(geometry: VesselGeometry, samples = 120): ProfilePoint[] {
  const vessel = buildVessel(geometry);
  return Array.from({ length: samples + 1 }, (_, i) => {
    const heightM = (vessel.totalHeightM * i) / samples;
    const r = vesselRadiusAt(vessel, heightM);
    return {
      heightM: parseFloat(heightM.toFixed(4)),
      leftM: parseFloat((-r).toFixed(4)),
      rightM: parseFloat(r.toFixed(4)),
    };
  });
}

interface Props {
  geometry: VesselGeometry;
  exposure: FireExposureResult;
}

export default function VesselSketch({ geometry, exposure }: Props) {
  const data = buildVesselProfile(geometry);
  const fireLineM = exposure.fireLimitAboveBottomM;

  return (
    <ResponsiveContainer width="100%" height="100%">
      <LineChart layout="vertical" data={data} margin={{ top: 10, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis
          type="number"
          tick={{ fontSize: 10 }}
          label={{ value: 'Radius (m)', position: 'insideBottom', offset: -2, fontSize: 11 }}
        />
        <YAxis
          type="number"
          dataKey="heightM"
          domain={[0, 'dataMax']}
          tick={{ fontSize: 10 }}
          label={{ value: 'Height above bottom (m)', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
        <ReferenceLine
          y={exposure.liquidHeightM}
          stroke="#3182ce"
          strokeDasharray="4 4"
          label={{ value: 'Liquid level', fontSize: 10, fill: '#3182ce' }}
        />
        {fireLineM > 0 && fireLineM < exposure.totalHeightM && (
          <ReferenceLine
            y={fireLineM}
            stroke="#e53e3e"
            strokeDasharray="4 4"
            label={{ value: 'Fire height limit', fontSize: 10, fill: '#e53e3e' }}
          />
        )}
        <Line type="linear" dataKey="rightM" name="Shell" stroke="#2d3748" strokeWidth={2} dot={false} />
        <Line type="linear" dataKey="leftM" legendType="none" stroke="#2d3748" strokeWidth={2} dot={false} />
      </LineChart>
    </ResponsiveContainer>
  );
}
