import type { Device, Gender, TimeUnit, TrendFilters } from '../types/trend';

export interface TrendFilterValues {
  startDate: string;
  endDate: string;
  timeUnit: TimeUnit;
  device: Device;
  gender: Gender;
  ages: string[];
}

const AGE_BANDS = ['10', '20', '30', '40', '50', '60'];

/** Only the demographic filters that are set end up in the request. */
export function toTrendFilters(values: TrendFilterValues): TrendFilters {
  const filters: TrendFilters = { startDate: values.startDate, endDate: values.endDate, timeUnit: values.timeUnit };
  if (values.device) filters.device = values.device;
  if (values.gender) filters.gender = values.gender;
  if (values.ages.length) filters.ages = values.ages;
  return filters;
}

interface TrendFiltersFormProps {
  values: TrendFilterValues;
  onChange: (values: TrendFilterValues) => void;
}

export function TrendFiltersForm({ values, onChange }: TrendFiltersFormProps) {
  const toggleAge = (age: string) => {
    const ages = values.ages.includes(age) ? values.ages.filter(band => band !== age) : [...values.ages, age];
    onChange({ ...values, ages });
  };

  return (
    <fieldset className="trend-filters">
      <label>
        Start date
        <input type="date" value={values.startDate} onChange={(event) => onChange({ ...values, startDate: event.target.value })} />
      </label>
      <label>
        End date
        <input type="date" value={values.endDate} onChange={(event) => onChange({ ...values, endDate: event.target.value })} />
      </label>
      <label>
        Unit
        <select
          value={values.timeUnit}
          onChange={(event) => {
            const unit = event.target.value;
            onChange({ ...values, timeUnit: unit === 'week' || unit === 'month' ? unit : 'date' });
          }}
        >
          <option value="date">Day</option>
          <option value="week">Week</option>
          <option value="month">Month</option>
        </select>
      </label>
      <label>
        Device
        <select
          value={values.device}
          onChange={(event) => {
            const device = event.target.value;
            onChange({ ...values, device: device === 'pc' || device === 'mo' ? device : '' });
          }}
        >
          <option value="">All</option>
          <option value="pc">PC</option>
          <option value="mo">Mobile</option>
        </select>
      </label>
      <label>
        Gender
        <select
          value={values.gender}
          onChange={(event) => {
            const gender = event.target.value;
            onChange({ ...values, gender: gender === 'm' || gender === 'f' ? gender : '' });
          }}
        >
          <option value="">All</option>
          <option value="m">Male</option>
          <option value="f">Female</option>
        </select>
      </label>
      <div className="trend-filters__ages" role="group" aria-label="Age bands">
        {AGE_BANDS.map(age => (
          <label key={age}>
            <input type="checkbox" checked={values.ages.includes(age)} onChange={() => toggleAge(age)} />
            {age}s
          </label>
        ))}
      </div>
    </fieldset>
  );
}
