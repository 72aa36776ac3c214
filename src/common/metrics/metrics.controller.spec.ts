import { Test, TestingModule } from '@nestjs/testing';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';

describe('MetricsController', () => {
  let controller: MetricsController;

  const mockMetricsService = {
    getMetrics: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [MetricsController],
      providers: [
        {
          provide: MetricsService,
          useValue: mockMetricsService,
        },
      ],
    }).compile();

    controller = module.get<MetricsController>(MetricsController);
  });

  describe('GET /actuator/prometheus', () => {
    it('should return the registry exposition unchanged', async () => {
      // Arrange
      const exposition = '# HELP app_requests_total Total number of requests\n# TYPE app_requests_total counter\n';
      mockMetricsService.getMetrics.mockResolvedValue(exposition);

      // Act
      const result = await controller.getMetrics();

      // Assert
      expect(mockMetricsService.getMetrics).toHaveBeenCalledTimes(1);
      expect(result).toBe(exposition);
    });

    it('should propagate registry failures', async () => {
      mockMetricsService.getMetrics.mockRejectedValue(new Error('collect failed'));

      await expect(controller.getMetrics()).rejects.toThrow('collect failed');
    });
  });
});
