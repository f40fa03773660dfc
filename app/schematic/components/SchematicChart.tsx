'use client'
import { useEffect, useRef } from 'react'
import * as d3 from 'd3'
import type { SchematicScene } from '../schematicLayout'

const WIDTH = 1000
const MARGIN = { top: 40, right: 20, bottom: 20, left: 20 }

export default function SchematicChart({ scene }: { scene: SchematicScene }) {
  const ref = useRef<SVGSVGElement | null>(null)

  useEffect(() => {
    if (!ref.current) return
    const svg = d3.select(ref.current)
    svg.selectAll('*').remove()
    svg.attr('viewBox', `0 0 ${WIDTH} ${scene.height}`)

    const plotWidth = WIDTH - MARGIN.left - MARGIN.right
    const plotHeight = scene.height - MARGIN.top - MARGIN.bottom
    const x = d3.scaleLinear().domain(scene.xRange).range([MARGIN.left, MARGIN.left + plotWidth])
    // rows grow downward: row 0 sits just under the tick labels
    const y = d3.scaleLinear().domain(scene.yRange).range([MARGIN.top, MARGIN.top + plotHeight])

    svg.append('text')
      .attr('x', WIDTH / 2)
      .attr('y', MARGIN.top / 2)
      .attr('text-anchor', 'middle')
      .attr('font-size', 16)
      .attr('font-weight', 600)
      .text(scene.title)

    const grid = svg.append('g').attr('data-testid', 'schematic-gridlines')
    grid.selectAll('line')
      .data(scene.gridlines)
      .enter()
      .append('line')
      .attr('x1', (d) => x(d.hours))
      .attr('x2', (d) => x(d.hours))
      .attr('y1', (d) => y(d.y0))
      .attr('y2', (d) => y(d.y1))
      .attr('stroke', 'lightgray')
      .attr('stroke-dasharray', '2 2')
    grid.selectAll('text')
      .data(scene.gridlines)
      .enter()
      .append('text')
      .attr('x', (d) => x(d.hours))
      .attr('y', (d) => y(d.labelY))
      .attr('text-anchor', 'middle')
      .attr('font-size', 10)
      .attr('fill', 'gray')
      .text((d) => d.label)

    svg.append('g')
      .selectAll('rect')
      .data(scene.bands)
      .enter()
      .append('rect')
      .attr('data-testid', 'schematic-band')
      .attr('x', (d) => x(d.x0))
      .attr('y', (d) => y(d.y0))
      .attr('width', (d) => x(d.x1) - x(d.x0))
      .attr('height', (d) => y(d.y1) - y(d.y0))
      .attr('fill', (d) => d.fill)

    svg.append('g')
      .selectAll('rect')
      .data(scene.segments)
      .enter()
      .append('rect')
      .attr('data-testid', 'schematic-segment')
      .attr('data-segment-id', (d) => d.segmentId)
      .attr('x', (d) => x(d.x0))
      .attr('y', (d) => y(d.y0))
      .attr('width', (d) => x(d.x1) - x(d.x0))
      .attr('height', (d) => y(d.y1) - y(d.y0))
      .attr('fill', (d) => d.fill)
      .attr('stroke', 'black')
      .attr('stroke-width', 2)
      .append('title')
      .text((d) => `${d.segmentId}: ${d.x0.toFixed(1)}h to ${d.x1.toFixed(1)}h`)

    const connectors = svg.append('g').attr('data-testid', 'schematic-connectors')
    connectors.selectAll('line')
      .data(scene.connectors)
      .enter()
      .append('line')
      .attr('x1', (d) => x(d.x0))
      .attr('x2', (d) => x(d.x1))
      .attr('y1', (d) => y(d.y))
      .attr('y2', (d) => y(d.y))
      .attr('stroke', 'gray')
      .attr('stroke-width', 2)
    connectors.selectAll('text')
      .data(scene.connectors)
      .enter()
      .append('text')
      .attr('x', (d) => x(d.glyphX))
      .attr('y', (d) => y(d.glyphY))
      .attr('text-anchor', 'middle')
      .attr('font-size', 16)
      .attr('fill', 'gray')
      .text('→')

    const labels = svg.append('g')
    scene.labels.forEach((label) => {
      const text = labels.append('text')
        .attr('text-anchor', 'middle')
        .attr('font-size', 10)
        .attr('fill', 'white')
        .attr('font-weight', 600)
      label.lines.forEach((line, index) => {
        text.append('tspan')
          .attr('x', x(label.x))
          .attr('y', y(label.y))
          .attr('dy', `${(index - (label.lines.length - 1) / 2) * 1.2}em`)
          .text(line)
      })
    })

    svg.append('g')
      .selectAll('text')
      .data(scene.rows)
      .enter()
      .append('text')
      .attr('data-testid', 'schematic-row')
      .attr('x', (d) => x(d.labelX))
      .attr('y', (d) => y(d.row))
      .attr('text-anchor', 'end')
      .attr('dominant-baseline', 'middle')
      .attr('font-size', 12)
      .attr('font-weight', 600)
      .text((d) => d.armId)

    // legend coordinates are fractions of the plot area measured from its bottom-left corner
    const legend = svg.append('g').attr('data-testid', 'schematic-legend')
    scene.legend.forEach((entry) => {
      const left = MARGIN.left + entry.x * plotWidth
      const top = MARGIN.top + (1 - entry.y) * plotHeight
      legend.append('rect')
        .attr('x', left)
        .attr('y', top - 5)
        .attr('width', 10)
        .attr('height', 10)
        .attr('fill', entry.color)
      legend.append('text')
        .attr('x', left + 14)
        .attr('y', top)
        .attr('dominant-baseline', 'middle')
        .attr('font-size', 10)
        .text(entry.label)
    })
  }, [scene])

  return <svg ref={ref} role="img" aria-label={scene.title} width="100%" height={scene.height} />
}
