import { useState, type FormEvent } from 'react';

interface RevealFormProps {
  disabled: boolean;
  onSubmit: (time: string) => Promise<boolean>;
}

function RevealForm({ disabled, onSubmit }: RevealFormProps) {
  const [time, setTime] = useState('');

  const handleSubmit = async (event: FormEvent) => {
    event.preventDefault();
    if (!time) return;
    if (await onSubmit(time)) {
      setTime('');
    }
  };

  return (
    <form className="card reveal-form" onSubmit={handleSubmit}>
      <div className="form-group">
        <label htmlFor="actual-time">Actual leave time (HH:MM):</label>
        <input
          id="actual-time"
          type="text"
          className="input"
          placeholder="HH:MM (e.g., 17:45)"
          value={time}
          onChange={(e) => setTime(e.target.value)}
          maxLength={5}
        />
      </div>
      <button type="submit" className="btn btn-accent" disabled={disabled || !time}>
        Submit Actual Time
      </button>
    </form>
  );
}

export default RevealForm;
