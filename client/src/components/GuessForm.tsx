import { useState, type FormEvent } from 'react';

interface GuessFormProps {
  participants: string[];
  disabled: boolean;
  onSubmit: (guesses: Record<string, string>) => Promise<boolean>;
}

function GuessForm({ participants, disabled, onSubmit }: GuessFormProps) {
  const [values, setValues] = useState<Record<string, string>>({});

  const handleSubmit = async (event: FormEvent) => {
    event.preventDefault();
    const saved = await onSubmit(values);
    if (saved) {
      setValues({});
    }
  };

  return (
    <form className="card guess-form" onSubmit={handleSubmit}>
      <p>Enter your guess for when the rat will leave (HH:MM format):</p>
      {participants.map((name) => (
        <div key={name} className="form-group">
          <label htmlFor={`guess-${name}`}>{name}:</label>
          <input
            id={`guess-${name}`}
            type="text"
            className="input"
            placeholder="HH:MM (e.g., 17:30)"
            value={(Object.hasOwn(values, name) ? values[name] : undefined) ?? ''}
            onChange={(e) => setValues({ ...values, [name]: e.target.value })}
            maxLength={5}
          />
        </div>
      ))}
      <button type="submit" className="btn btn-primary" disabled={disabled}>
        Submit Guess
      </button>
    </form>
  );
}

export default GuessForm;
