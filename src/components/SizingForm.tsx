import type { HeadType } from '../engine/schema/SizingInputV1';
import {
  FIELD_GROUPS,
  HEAD_TYPE_LABELS,
  setNumberField,
} from '../ui/sizingForm/SizingFormModel';
import type { SizingFormValues } from '../ui/sizingForm/SizingFormModel';

interface Props {
  values: SizingFormValues;
  onChange: (values: SizingFormValues) => void;
  onSubmit: () => void;
}

const HEAD_TYPES: HeadType[] = ['torispherical', 'ellipsoidal', 'hemispherical'];

export default function SizingForm({ values, onChange, onSubmit }: Props) {
  return (
    <form
      className="sizing-form"
      onSubmit={e => {
        e.preventDefault();
        onSubmit();
      }}
    >
      <fieldset>
        <legend>Head</legend>
        <label className="form-row">
          <span>Head type</span>
          <select
            value={values.headType}
            onChange={e => {
              const next = HEAD_TYPES.find(t => t === e.target.value);
              if (next) onChange({ ...values, headType: next });
            }}
          >
            {HEAD_TYPES.map(type => (
              <option key={type} value={type}>{HEAD_TYPE_LABELS[type]}</option>
            ))}
          </select>
        </label>
      </fieldset>

      {FIELD_GROUPS.map(group => (
        <fieldset key={group.title}>
          <legend>{group.title}</legend>
          {group.fields.map(field => (
            <label key={field.id} className="form-row">
              <span>{field.label}</span>
              <input
                type="text"
                inputMode="decimal"
                value={values.numbers[field.id]}
                onChange={e => onChange(setNumberField(values, field.id, e.target.value))}
              />
              <span className="form-unit">{field.unit}</span>
            </label>
          ))}
        </fieldset>
      ))}

      <label className="form-row form-row--check">
        <input
          type="checkbox"
          checked={values.hasFirefighting}
          onChange={e => onChange({ ...values, hasFirefighting: e.target.checked })}
        />
        <span>Firefighting and drainage provided</span>
      </label>

      <button type="submit" className="cta-btn">Size relief device</button>
    </form>
  );
}
