import { Router } from 'express';
import authRoutes from './auth.routes';
import patientRoutes from './patient.routes';
import appointmentRoutes from './appointment.routes';

const router = Router();

// Status check, no auth
router.get('/status', (req, res) => {
  res.status(200).json({
    success: true,
    data: {
      status: 'online',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    },
  });
});

// Mount route modules
router.use(authRoutes);
router.use(patientRoutes);
router.use(appointmentRoutes);

export default router;
