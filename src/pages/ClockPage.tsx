import { useEffect, useState } from 'react';

const WORLD_CLOCKS = [
  { city: 'Cupertino', timeZone: 'America/Los_Angeles' },
  { city: 'New York', timeZone: 'America/New_York' },
  { city: 'London', timeZone: 'Europe/London' },
  { city: 'Tokyo', timeZone: 'Asia/Tokyo' },
  { city: 'Sydney', timeZone: 'Australia/Sydney' },
] as const;

export function formatClockTime(date: Date, timeZone: string) {
  return new Intl.DateTimeFormat('en-US', { hour: 'numeric', minute: '2-digit', timeZone }).format(date);
}

export function ClockPage() {
  const [now, setNow] = useState(() => new Date());

  useEffect(() => {
    const timer = window.setInterval(() => setNow(new Date()), 1000);
    return () => window.clearInterval(timer);
  }, []);

  return (
    <main className="h-full overflow-y-auto bg-black px-4 pt-14 text-white">
      <h1 className="pb-2 text-[34px] font-bold">World Clock</h1>
      <ul className="divide-y divide-white/15">
        {WORLD_CLOCKS.map((clock) => (
          <li key={clock.city} className="flex items-end justify-between py-3">
            <span className="text-[28px]">{clock.city}</span>
            <span className="text-[48px] font-thin tabular-nums">{formatClockTime(now, clock.timeZone)}</span>
          </li>
        ))}
      </ul>
    </main>
  );
}
