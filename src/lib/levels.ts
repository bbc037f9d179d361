// Experience curve: level 1 at 100 XP, then each level costs 100 more than the last

export function experienceRequiredForLevel(level: number): number {
  if (level <= 0) return 0
  return 100 * level + 50 * (level - 1) * level
}

export function levelForExperience(experience: number): number {
  if (!Number.isFinite(experience)) return 0
  let level = 0
  while (experienceRequiredForLevel(level + 1) <= experience) level++
  return level
}

/** Progress toward the next level, 0 (inclusive) to 1 (exclusive). */
export function levelProgress(experience: number): number {
  const level = levelForExperience(experience)
  const floor = experienceRequiredForLevel(level)
  const ceiling = experienceRequiredForLevel(level + 1)
  return (Math.max(experience, 0) - floor) / (ceiling - floor)
}
