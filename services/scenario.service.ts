/**
 * Senaryo Dağılımı Servisi
 * Çalıştırma başında her konuşma için senaryo etiketi belirler
 */

import logger from '@/lib/logger';
import { defaultRng, pickRandom, shuffle, type Rng } from '@/lib/utils';

/**
 * count adet senaryo etiketi üret.
 * Her etiket için floor(count * ağırlık) kopya, kalan yerler etiketler
 * arasından eşit olasılıklı çekilişle doldurulur, sonuç karıştırılır.
 */
export function selectScenarios(
  count: number,
  weights: Record<string, number>,
  rng: Rng = defaultRng
): string[] {
  if (count <= 0) return [];

  const scenarios: string[] = [];

  for (const [label, weight] of Object.entries(weights)) {
    // 1e-9: 10 * 0.3 = 2.9999999999999996 gibi durumlar
    const copies = Math.floor(count * weight + 1e-9);
    for (let i = 0; i < copies && scenarios.length < count; i++) {
      scenarios.push(label);
    }
  }

  const labels = Object.keys(weights);
  while (scenarios.length < count) {
    scenarios.push(pickRandom(labels, rng));
  }

  const result = shuffle(scenarios, rng);

  logger.debug('Senaryo dağılımı oluşturuldu', {
    count,
    distribution: countBy(result)
  });

  return result;
}

export function countBy(labels: readonly string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const label of labels) {
    counts[label] = (counts[label] ?? 0) + 1;
  }
  return counts;
}
