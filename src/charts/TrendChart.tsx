import React from 'react';
import { useData } from '@/context/DataContext';
import { ResponsiveContainer, LineChart, Line, XAxis, YAxis, Tooltip, CartesianGrid } from 'recharts';

export default function TrendChart() {
  const { series, total } = useData();

  return (
    <div className="panel w-full">
      <div style={{ fontWeight: 600, marginBottom: '.5rem' }}>
        Monthly Count of Exploited CVEs <span className="tiny">({total.toLocaleString()} matching)</span>
      </div>
      {series.length === 0 ? (
        <div className="placeholder">No data matches the selected filters.</div>
      ) : (
        <ResponsiveContainer width="100%" height={360}>
          <LineChart data={series} margin={{ top: 10, right: 20, left: 10, bottom: 10 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#304259" />
            <XAxis dataKey="month" tick={{ fontSize: 10, fill: '#9fb0c3' }} axisLine={{ stroke: '#304259' }} tickLine={{ stroke: '#304259' }} />
            <YAxis allowDecimals={false} tick={{ fontSize: 10, fill: '#9fb0c3' }} axisLine={{ stroke: '#304259' }} tickLine={{ stroke: '#304259' }} />
            <Tooltip formatter={(value: number) => [String(value), 'Number of CVEs']} labelFormatter={(label: string) => `Month ${label}`} />
            <Line type="monotone" dataKey="count" stroke="#8fd9a6" strokeWidth={2} dot={{ r: 3 }} activeDot={{ r: 5 }} isAnimationActive />
          </LineChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
