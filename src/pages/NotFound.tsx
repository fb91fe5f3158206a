import React from 'react';
import { Link } from 'react-router-dom';
import { Button } from '@/components/ui/Button';

export default function NotFound() {
  return (
    <div className="panel">
      <div style={{ fontSize: 18, fontWeight: 700 }}>Not Found</div>
      <div className="tiny">There is nothing at this address. The dashboard lives at the root.</div>
      <Link to="/"><Button variant="ghost" style={{ marginTop: '.75rem' }}>Back to dashboard</Button></Link>
    </div>
  );
}
