import forecast from '../data/weather.json';

const weekLow = Math.min(...forecast.daily.map((day) => day.low));
const weekHigh = Math.max(...forecast.daily.map((day) => day.high));

function rangeBarStyle(low: number, high: number) {
  const span = weekHigh - weekLow || 1;
  return {
    left: `${((low - weekLow) / span) * 100}%`,
    width: `${((high - low) / span) * 100}%`,
  };
}

export function WeatherPage() {
  const { current } = forecast;

  return (
    <main className="h-full overflow-y-auto bg-gradient-to-b from-sky-600 to-sky-400 px-4 pb-10 pt-16 text-white">
      <header className="text-center">
        <h1 className="text-3xl">{forecast.city}</h1>
        <p className="text-8xl font-thin">{current.temp}°</p>
        <p className="text-lg">{current.condition}</p>
        <p className="text-lg">
          H:{current.high}° L:{current.low}°
        </p>
      </header>

      <section className="mt-8 rounded-2xl bg-white/15 p-4 backdrop-blur" aria-label="Hourly forecast">
        <ul className="flex gap-6 overflow-x-auto">
          {forecast.hourly.map((hour) => (
            <li key={hour.time} className="flex shrink-0 flex-col items-center gap-2 text-sm">
              <span>{hour.time}</span>
              <span className="text-xl" aria-hidden="true">
                {hour.icon}
              </span>
              <span className="text-lg">{hour.temp}°</span>
            </li>
          ))}
        </ul>
      </section>

      <section className="mt-4 rounded-2xl bg-white/15 p-4 backdrop-blur" aria-label="10-day forecast">
        <ul className="divide-y divide-white/20">
          {forecast.daily.map((day) => (
            <li key={day.day} className="flex items-center gap-3 py-2.5">
              <span className="w-14 text-lg">{day.day}</span>
              <span className="w-8 text-xl" aria-hidden="true">
                {day.icon}
              </span>
              <span className="w-10 text-right text-white/60">{day.low}°</span>
              <span className="relative h-1 flex-1 rounded-full bg-black/20">
                <span
                  className="absolute inset-y-0 rounded-full bg-gradient-to-r from-emerald-300 to-amber-400"
                  style={rangeBarStyle(day.low, day.high)}
                />
              </span>
              <span className="w-10">{day.high}°</span>
            </li>
          ))}
        </ul>
      </section>
    </main>
  );
}
