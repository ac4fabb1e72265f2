/**
 * C sources and candidate tests shared across suites
 */

import { analyzeSources } from "@/analyzer/source-analyzer.js";
import type { AnalysisResult } from "@/analyzer/source-analyzer.js";
import type { FunctionSignature } from "@/analyzer/types.js";
import { StubSynthesizer } from "@/stubs/synthesizer.js";
import { buildTestContext } from "@/testgen/context.js";
import type { TestContext } from "@/testgen/types.js";

export const CLAMP_SOURCE = `#include "clamp.h"

int clamp(int value, int lo, int hi)
{
    if (value < lo) {
        return lo;
    }
    if (value > hi) {
        return hi;
    }
    return value;
}
`;

export const HAL_HEADER = `#ifndef HAL_H
#define HAL_H

int hal_read_adc(int channel);

#endif
`;

export const SENSOR_SOURCE = `#include "hal.h"

static int last_reading;

int read_sensor(int channel)
{
    int raw = hal_read_adc(channel);
    if (raw < 0) {
        return -1;
    }
    last_reading = raw;
    return raw * 2;
}
`;

/** clamp beside a reader that reaches the HAL through a static helper */
export const MIXED_SOURCE = `#include "hal.h"

static int last_reading;

int clamp(int value, int lo, int hi)
{
    if (value < lo) {
        return lo;
    }
    if (value > hi) {
        return hi;
    }
    return value;
}

static int sample(int channel)
{
    int raw = hal_read_adc(channel);
    last_reading = raw;
    return raw;
}

int read_scaled(int channel)
{
    return clamp(sample(channel), 0, 100);
}
`;

/** Three assertions for three branches, no issues */
export const CLAMP_HIGH = `#include "unity.h"

void setUp(void) {}

void tearDown(void) {}

void test_clamp_below_min(void)
{
    TEST_ASSERT_EQUAL_INT(10, clamp(5, 10, 20));
}

void test_clamp_above_max(void)
{
    TEST_ASSERT_EQUAL_INT(20, clamp(25, 10, 20));
}

void test_clamp_inside_range(void)
{
    TEST_ASSERT_EQUAL_INT(15, clamp(15, 10, 20));
}

int main(void)
{
    UNITY_BEGIN();
    RUN_TEST(test_clamp_below_min);
    RUN_TEST(test_clamp_above_max);
    RUN_TEST(test_clamp_inside_range);
    return UNITY_END();
}
`;

/** One assertion for three branches */
export const CLAMP_MEDIUM = `#include "unity.h"

void setUp(void) {}

void tearDown(void) {}

void test_clamp_inside_range(void)
{
    TEST_ASSERT_EQUAL_INT(15, clamp(15, 10, 20));
}

int main(void)
{
    UNITY_BEGIN();
    RUN_TEST(test_clamp_inside_range);
    return UNITY_END();
}
`;

export const SENSOR_HIGH = `#include "unity.h"
#include <string.h>

void setUp(void)
{
    memset(&stub_hal_read_adc, 0, sizeof(stub_hal_read_adc));
}

void tearDown(void)
{
    memset(&stub_hal_read_adc, 0, sizeof(stub_hal_read_adc));
}

void test_read_sensor_doubles_reading(void)
{
    stub_hal_read_adc.return_value = 21;
    TEST_ASSERT_EQUAL_INT(42, read_sensor(3));
    TEST_ASSERT_EQUAL_INT(3, stub_hal_read_adc.last_channel);
}

void test_read_sensor_negative_reading(void)
{
    stub_hal_read_adc.return_value = -5;
    TEST_ASSERT_EQUAL_INT(-1, read_sensor(1));
}

int main(void)
{
    UNITY_BEGIN();
    RUN_TEST(test_read_sensor_doubles_reading);
    RUN_TEST(test_read_sensor_negative_reading);
    return UNITY_END();
}
`;

export const PROJECT_FILES = [
  { path: "src/clamp.c", text: CLAMP_SOURCE },
  { path: "src/hal.h", text: HAL_HEADER },
  { path: "src/sensor.c", text: SENSOR_SOURCE },
];

export function analyzeProject(): AnalysisResult {
  return analyzeSources(PROJECT_FILES);
}

function findTarget(analysis: AnalysisResult, unitPath: string, name: string): FunctionSignature {
  const unit = analysis.units.find((u) => u.path === unitPath);
  const target = unit?.functions.find((f) => f.name === name);
  if (!target) {
    throw new Error(`fixture function ${name} not found in ${unitPath}`);
  }
  return target;
}

export function contextFor(unitPath: string, name: string, analysis: AnalysisResult = analyzeProject()): TestContext {
  const target = findTarget(analysis, unitPath, name);
  const unit = analysis.units.find((u) => u.path === unitPath);
  if (!unit) {
    throw new Error(`fixture unit ${unitPath} not found`);
  }
  return buildTestContext(target, unit, analysis.graph, new StubSynthesizer());
}

export function clampContext(): TestContext {
  return contextFor("src/clamp.c", "clamp");
}

export function sensorContext(): TestContext {
  return contextFor("src/sensor.c", "read_sensor");
}

export function mixedAnalysis(): AnalysisResult {
  return analyzeSources([
    { path: "src/hal.h", text: HAL_HEADER },
    { path: "src/mixed.c", text: MIXED_SOURCE },
  ]);
}
